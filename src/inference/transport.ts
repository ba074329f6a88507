import { z } from 'zod';
import type { Logger } from 'pino';
import type { BrainMode, SourceFacts } from '../types/index.js';
import {
  PermanentRemoteError,
  TransientNetworkError,
  ValidationFailureError,
  describeError
} from '../errors.js';
import { logger as rootLogger } from '../logger.js';
import { abortReason } from './deadline.js';

export interface RemoteQuery {
  mode: BrainMode;
  query: string;
  context: SourceFacts;
}

export interface RemoteReply {
  response: string;
  parsedData?: unknown;
  confidence?: number;
}

export interface BrainTransport {
  query(payload: RemoteQuery, signal: AbortSignal): Promise<RemoteReply>;
  health(signal?: AbortSignal): Promise<boolean>;
}

const replySchema = z.object({
  response: z.string().default(''),
  parsed_data: z.unknown().optional(),
  confidence: z.number().min(0).max(1).optional()
});

export interface HttpTransportOptions {
  baseUrl: string;
  queryPath?: string;
  healthPath?: string;
  headers?: Record<string, string>;
  fetch?: typeof fetch;
  logger?: Logger;
}

export class HttpBrainTransport implements BrainTransport {
  private readonly queryUrl: string;
  private readonly healthUrl: string;
  private readonly headers: Record<string, string>;
  private readonly fetchImpl: typeof fetch;
  private readonly logger: Logger;

  constructor(options: HttpTransportOptions) {
    const baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.queryUrl = `${baseUrl}${options.queryPath ?? '/query'}`;
    this.healthUrl = `${baseUrl}${options.healthPath ?? '/health'}`;
    this.headers = { 'Content-Type': 'application/json', ...options.headers };
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.logger = (options.logger ?? rootLogger).child({ component: 'transport' });
  }

  async query(payload: RemoteQuery, signal: AbortSignal): Promise<RemoteReply> {
    let response: Response;
    try {
      response = await this.fetchImpl(this.queryUrl, {
        method: 'POST',
        headers: this.headers,
        body: JSON.stringify(payload),
        signal
      });
    } catch (error) {
      if (signal.aborted) throw abortReason(signal);
      throw new TransientNetworkError(`Remote service unreachable: ${describeError(error)}`, undefined, { cause: error });
    }

    if (response.status === 429 || response.status >= 500) {
      throw new TransientNetworkError(`Remote service error: ${response.status}`, response.status);
    }

    if (!response.ok) {
      throw new PermanentRemoteError(response.status, `Remote service rejected request: ${response.status}`);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      if (signal.aborted) throw abortReason(signal);
      throw new ValidationFailureError('Remote service returned a body that is not JSON', { cause: error });
    }

    const parsed = replySchema.safeParse(body);
    if (!parsed.success) {
      throw new ValidationFailureError('Remote reply does not match the expected shape');
    }

    return {
      response: parsed.data.response,
      parsedData: parsed.data.parsed_data,
      confidence: parsed.data.confidence
    };
  }

  async health(signal?: AbortSignal): Promise<boolean> {
    try {
      const response = await this.fetchImpl(this.healthUrl, { method: 'GET', signal });
      return response.ok;
    } catch (error) {
      this.logger.debug({ error: describeError(error) }, 'Health check failed');
      return false;
    }
  }
}
