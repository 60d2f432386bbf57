import { z } from 'zod';
import type { Config } from '../shared/config.js';
import { errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { EntityDraft } from './draft.js';

export type Verdict =
  | { verdict: 'accepted' }
  | { verdict: 'rejected'; reason: string }
  | { verdict: 'unavailable'; reason: string };

/**
 * External plausibility check for a draft. Implementations never throw:
 * anything that prevents a verdict is reported as `unavailable`.
 */
export interface DraftVerifier {
  verify(draft: EntityDraft): Promise<Verdict>;
}

const VerifierResponse = z.object({
  verdict: z.enum(['accepted', 'rejected']),
  reason: z.string().optional(),
});

export class HttpVerifier implements DraftVerifier {
  private readonly url: string;
  private readonly token: string;
  private readonly timeoutMs: number;

  constructor(
    config: Config['verifier'],
    private readonly fetchImpl: typeof fetch = fetch,
  ) {
    this.url = config.url;
    this.token = config.token;
    this.timeoutMs = config.timeout_ms;
  }

  isConfigured(): boolean {
    return this.url.length > 0;
  }

  async verify(draft: EntityDraft): Promise<Verdict> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const headers: Record<string, string> = { 'Content-Type': 'application/json' };
      if (this.token) headers['Authorization'] = `Bearer ${this.token}`;

      const response = await this.fetchImpl(this.url, {
        method: 'POST',
        headers,
        body: JSON.stringify({ kind: draft.kind, fields: draft.fields, provenance: draft.provenance }),
        signal: controller.signal,
      });
      if (!response.ok) {
        return { verdict: 'unavailable', reason: `verifier responded ${response.status}` };
      }

      const parsed = VerifierResponse.safeParse(await response.json());
      if (!parsed.success) {
        return { verdict: 'unavailable', reason: 'verifier response did not match schema' };
      }
      if (parsed.data.verdict === 'rejected') {
        return { verdict: 'rejected', reason: parsed.data.reason ?? 'rejected by verifier' };
      }
      return { verdict: 'accepted' };
    } catch (err) {
      const reason = controller.signal.aborted
        ? `verifier timed out after ${this.timeoutMs}ms`
        : `verifier request failed: ${errorMessage(err)}`;
      logger.debug({ natural_key: draft.natural_key, reason }, 'Verifier unavailable');
      return { verdict: 'unavailable', reason };
    } finally {
      clearTimeout(timer);
    }
  }
}
