import { getServerEnv, type ServerEnv } from '@dealrelay/shared';
import { z } from 'zod';

import { PublishError } from '../errors.js';
import { createLogger } from '../utils/log.js';

const log = createLogger('publisher');

export interface Publisher {
  readonly name: string;
  /** Resolves to the external post id. Fails with PublishError. */
  publish(text: string): Promise<string>;
}

const createPostResponseSchema = z.object({
  data: z.object({ id: z.string().min(1) }),
});

export type XPublisherConfig = {
  baseUrl: string;
  accessToken: string;
};

export function getXPublisherConfig(env: ServerEnv = getServerEnv()): XPublisherConfig {
  const accessToken = env.X_USER_ACCESS_TOKEN ?? '';
  if (!accessToken) throw new Error('Missing publishing env vars. Set X_USER_ACCESS_TOKEN.');
  return { baseUrl: env.X_API_BASE_URL.replace(/\/+$/, ''), accessToken };
}

/** Posts through the X v2 API with a user-context bearer token. */
export class XPublisher implements Publisher {
  readonly name = 'x';

  constructor(private readonly cfg: XPublisherConfig) {}

  async publish(text: string): Promise<string> {
    let res: Response;
    try {
      res = await fetch(`${this.cfg.baseUrl}/2/tweets`, {
        method: 'POST',
        headers: {
          authorization: `Bearer ${this.cfg.accessToken}`,
          'content-type': 'application/json',
        },
        body: JSON.stringify({ text }),
      });
    } catch (e) {
      throw new PublishError('publisher unreachable', { cause: e });
    }

    const body = await res.text().catch(() => '');
    if (!res.ok) {
      throw new PublishError(`publish failed: HTTP ${res.status}: ${body.slice(0, 300)}`, { status: res.status });
    }

    let json: unknown;
    try {
      json = JSON.parse(body);
    } catch (e) {
      throw new PublishError('publish response was not JSON', { status: res.status, cause: e });
    }
    const parsed = createPostResponseSchema.safeParse(json);
    if (!parsed.success) throw new PublishError('publish response missing post id', { status: res.status });
    return parsed.data.data.id;
  }
}

/** Logs the post instead of sending it. Used while the publishing kill switch is off. */
export class DryRunPublisher implements Publisher {
  readonly name = 'dry-run';
  private seq = 0;

  async publish(text: string): Promise<string> {
    this.seq += 1;
    const id = `dry-run-${this.seq}`;
    log.info('dry run, not posting', { id, length: text.length });
    log.debug(text);
    return id;
  }
}

/**
 * Fail-closed: nothing is posted unless PUBLISHING_ENABLED=true and credentials are present.
 */
export function createPublisher(env: ServerEnv = getServerEnv()): Publisher {
  if (!env.PUBLISHING_ENABLED) {
    log.warn('publishing disabled (PUBLISHING_ENABLED=false); using dry-run publisher');
    return new DryRunPublisher();
  }
  return new XPublisher(getXPublisherConfig(env));
}
