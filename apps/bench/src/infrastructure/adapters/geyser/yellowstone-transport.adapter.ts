import type { CommitmentName } from '@race/config';
import type {
  FeedConnection,
  FeedDefinition,
  FeedTransport,
} from '@race/bench/domain/services/ports/feed-transport.port';
import { EventChannel } from '@race/bench/infrastructure/adapters/channel/event-channel';
import { GRPC_MAX_RECEIVE_MESSAGE_BYTES } from '@race/bench/infrastructure/constants';
import { createChildLogger } from '@race/bench/infrastructure/logging/pino-logger';
import Client, { type SubscribeRequest, type SubscribeUpdate } from '@triton-one/yellowstone-grpc';
import { buildPingReply, buildSlotSubscription } from './subscription-request';
import { decodeGeyserUpdate } from './update-decoder';

const log = createChildLogger('yellowstone');

/**
 * Geyser gRPC transport. TLS follows the endpoint scheme; the stream token goes out as `x-token`.
 */
export class YellowstoneTransport implements FeedTransport<SubscribeUpdate> {
  async connect(
    definition: FeedDefinition,
    commitment: CommitmentName,
  ): Promise<FeedConnection<SubscribeUpdate> & { readonly updates: EventChannel<SubscribeUpdate> }> {
    const { stream: identity, accessToken } = definition;
    log.debug(`${identity.name}: opening subscription to ${identity.endpoint}`);

    const client = new Client(identity.endpoint, accessToken, {
      'grpc.max_receive_message_length': GRPC_MAX_RECEIVE_MESSAGE_BYTES,
    });
    const stream = await client.subscribe().catch((error: unknown) => {
      client._client.close();
      throw error;
    });
    const updates = new EventChannel<SubscribeUpdate>();

    stream.on('data', (update: SubscribeUpdate) => {
      updates.send(update);
    });
    stream.on('error', (error: Error) => {
      updates.close(error);
    });
    stream.on('end', () => {
      updates.close();
    });

    let shut = false;
    const shutdown = (): void => {
      if (shut) {
        return;
      }
      shut = true;
      stream.cancel();
      client._client.close();
    };

    const write = (request: SubscribeRequest): Promise<void> =>
      new Promise<void>((resolve, reject) => {
        stream.write(request, (error: Error | null | undefined) => {
          if (error) {
            reject(error);
          } else {
            resolve();
          }
        });
      });

    try {
      await write(buildSlotSubscription(commitment));
    } catch (error) {
      shutdown();
      throw error;
    }

    return {
      updates,
      decode: decodeGeyserUpdate,
      sendPing: (id) => write(buildPingReply(id)),
      close: () => {
        updates.close();
        shutdown();
      },
    };
  }
}
