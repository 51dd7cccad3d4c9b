/**
 * Redis Stream Alert Sink
 *
 * Publishes each alert to a Redis stream as
 * `type=mev-alert data=<opportunity JSON>`, trimmed with an approximate MAXLEN.
 */

import { DispatchError, type AlertSink, type Opportunity } from '@mev-sentinel/types';

/**
 * Subset of the ioredis client used here.
 */
export interface AlertStreamWriter {
  xadd(stream: string, ...args: string[]): Promise<string | null>;
}

export interface RedisStreamAlertSinkOptions {
  stream: string;
  maxLen: number;
}

const MEV_ALERT_MESSAGE_TYPE = 'mev-alert';

export class RedisStreamAlertSink implements AlertSink {
  readonly name = 'redis-stream';

  constructor(
    private readonly writer: AlertStreamWriter,
    private readonly options: RedisStreamAlertSinkOptions
  ) {}

  async send(opportunity: Opportunity): Promise<void> {
    const { stream, maxLen } = this.options;

    const messageId = await this.writer.xadd(
      stream,
      'MAXLEN', '~', String(maxLen),
      '*',
      'type', MEV_ALERT_MESSAGE_TYPE,
      'data', JSON.stringify(opportunity)
    );

    if (messageId === null) {
      throw new DispatchError(`Stream ${stream} did not accept the alert`, opportunity.id, {
        context: { stream }
      });
    }
  }
}
