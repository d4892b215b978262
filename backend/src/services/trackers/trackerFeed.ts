/**
 * Remote tracker feed client
 *
 * Fetches the third-party tracker list (JSON array of tracker descriptors)
 * with axios. Any non-200 answer or transport failure becomes a
 * NetworkError; a body that is not the expected JSON becomes a ConfigError.
 */

import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import { ConfigError, NetworkError } from '../../utils/errors';
import { formatIssues } from '../../utils/validation/formatIssues';

export interface TrackerDescriptor {
  /** Display name, e.g. "Google AdMob" */
  name: string;
  /** Dotted class/package paths separated by `|` */
  code_signature: string;
}

export interface TrackerFeed {
  /** Where descriptors come from, for log lines and errors */
  readonly url: string;
  fetchTrackers(): Promise<TrackerDescriptor[]>;
}

const trackerDescriptorSchema = z
  .object({
    name: z.string(),
    code_signature: z.string()
  })
  .passthrough();

export const trackerListSchema = z.array(trackerDescriptorSchema);

export interface HttpTrackerFeedOptions {
  url: string;
  /** Request timeout in milliseconds */
  timeout: number;
  /** Preconfigured axios instance; defaults to a fresh one */
  client?: AxiosInstance;
}

/**
 * Validate a decoded payload; unknown descriptor fields are dropped
 */
export function parseTrackerList(payload: unknown, source: string): TrackerDescriptor[] {
  const parsed = trackerListSchema.safeParse(payload);
  if (!parsed.success) {
    throw new ConfigError(`Unexpected tracker list from ${source}: ${formatIssues(parsed.error).slice(0, 5).join('; ')}`, source);
  }
  return parsed.data.map(({ name, code_signature }) => ({ name, code_signature }));
}

export class HttpTrackerFeed implements TrackerFeed {
  readonly url: string;
  private readonly timeout: number;
  private readonly client: AxiosInstance;

  constructor(options: HttpTrackerFeedOptions) {
    this.url = options.url;
    this.timeout = options.timeout;
    this.client = options.client ?? axios.create();
  }

  async fetchTrackers(): Promise<TrackerDescriptor[]> {
    let status: number;
    let body: unknown;

    try {
      const response = await this.client.get<unknown>(this.url, {
        timeout: this.timeout,
        headers: { Accept: 'application/json' },
        responseType: 'text',
        transformResponse: [(data: unknown) => data],
        validateStatus: () => true
      });
      status = response.status;
      body = response.data;
    } catch (error) {
      const reason = axios.isAxiosError(error)
        ? error.code ?? error.message
        : error instanceof Error ? error.message : String(error);
      throw new NetworkError(`Cannot reach tracker feed ${this.url}: ${reason}`, this.url);
    }

    if (status !== 200) {
      throw new NetworkError(`Tracker feed ${this.url} responds code=${status}`, this.url, status);
    }

    return parseTrackerList(decodeBody(body, this.url), this.url);
  }
}

function decodeBody(body: unknown, source: string): unknown {
  if (typeof body !== 'string') {
    return body;
  }
  try {
    return JSON.parse(body);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Tracker feed ${source} did not return valid JSON: ${reason}`, source);
  }
}
