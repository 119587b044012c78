import { NANOS_PER_MICRO, NANOS_PER_MILLI } from '@race/bench/infrastructure/constants';
import type { RaceSnapshot, StreamMetrics } from '@race/domain';

export const SUMMARY_HEADER = '=== RACE SUMMARY ===';

/** Human duration: whole ns below 1µs, one decimal in µs, three decimals in ms. */
export function formatDuration(nanos: number): string {
  if (nanos < NANOS_PER_MICRO) {
    return `${Math.round(nanos)}ns`;
  }
  if (nanos < NANOS_PER_MILLI) {
    return `${(nanos / NANOS_PER_MICRO).toFixed(1)}µs`;
  }
  return `${(nanos / NANOS_PER_MILLI).toFixed(3)}ms`;
}

export function formatRaceSummary(snapshot: RaceSnapshot): string[] {
  const lines = [
    SUMMARY_HEADER,
    `Slots tracked: ${snapshot.totalSlots} (complete: ${snapshot.completeRaces}, partial: ${snapshot.partialRaces})`,
  ];

  snapshot.metrics.forEach((metrics, index) => {
    lines.push(formatStreamLine(index + 1, metrics));
  });

  lines.push(formatVerdict(snapshot.metrics));

  if (snapshot.isComplete) {
    lines.push('Race complete: slot capacity reached');
  }

  return lines;
}

function formatStreamLine(rank: number, metrics: StreamMetrics): string {
  const margin = metrics.averageWinMarginNs === null ? 'n/a' : formatDuration(metrics.averageWinMarginNs);
  return (
    `#${rank} ${metrics.stream.name}: wins ${metrics.wins}/${metrics.participation} (${metrics.winRate.toFixed(1)}%), ` +
    `median ${formatDuration(metrics.medianBehindNs)}, p90 ${formatDuration(metrics.p90BehindNs)}, ` +
    `p95 ${formatDuration(metrics.p95BehindNs)}, p99 ${formatDuration(metrics.p99BehindNs)}, ` +
    `avg win margin ${margin}`
  );
}

function formatVerdict(metrics: readonly StreamMetrics[]): string {
  const [fastest, runnerUp] = metrics;
  if (!fastest) {
    return 'Verdict: no slots observed yet';
  }
  if (!runnerUp) {
    return `Verdict: ${fastest.stream.name} is the only stream reporting`;
  }

  const lead = runnerUp.medianBehindNs - fastest.medianBehindNs;
  if (lead === 0) {
    return `Verdict: ${fastest.stream.name} and ${runnerUp.stream.name} are tied on median`;
  }
  return `Verdict: ${fastest.stream.name} is fastest, median lead ${formatDuration(lead)} over ${runnerUp.stream.name}`;
}
