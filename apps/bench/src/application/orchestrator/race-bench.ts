import type { RefereeActor } from '@race/bench/application/use-cases/referee/referee-actor';
import type { RaceReporter } from '@race/bench/application/use-cases/report-race/race-reporter';
import type { StreamRunner } from '@race/bench/application/use-cases/run-stream/stream-runner';
import type { RaceCommand } from '@race/bench/domain/types/race-command';
import type { EventChannel } from '@race/bench/infrastructure/adapters/channel/event-channel';
import type { Container } from '@race/bench/infrastructure/di/container';
import {
  type BenchRegistry,
  IoCmoduleRegistry,
  type RegistryOverrides,
} from '@race/bench/infrastructure/di/module-registry';
import { type ConfigSchema, loadConfig } from '@race/config';

export interface RaceBenchOverrides extends RegistryOverrides {
  /** Skips `config/config.json` when given. */
  config?: ConfigSchema;
}

export abstract class RaceBench {
  protected readonly container: Container<BenchRegistry>;
  protected readonly config: ConfigSchema;

  constructor(overrides: RaceBenchOverrides = {}) {
    this.config = overrides.config ?? loadConfig().config;
    this.container = IoCmoduleRegistry(this.config, overrides);
  }

  // ============================================================================
  // Race state
  // ============================================================================

  protected getEvents(): EventChannel<RaceCommand> {
    return this.container.resolve('RaceEvents');
  }

  protected getRefereeActor(): RefereeActor {
    return this.container.resolve('RefereeActor');
  }

  // ============================================================================
  // Streams & reporting
  // ============================================================================

  protected getStreamRunners(): StreamRunner<unknown>[] {
    return this.container.resolve('StreamRunners');
  }

  protected getReporter(): RaceReporter {
    return this.container.resolve('RaceReporter');
  }
}
