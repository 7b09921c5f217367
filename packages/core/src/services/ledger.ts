/**
 * Ledger Service Client
 *
 * The remote ledger owns the chain and the transaction pool. Everything in
 * this package reads and writes them through the LedgerClient interface:
 *
 *   GET  /block           current head   -> { hash, block }
 *   GET  /block?hash=H    block by digest -> { block }
 *   GET  /txpool          pending txs     -> { hash, txs }
 *   POST /block           candidate block -> 2xx when accepted
 */

import type { ZodIssue, ZodType, ZodTypeDef } from 'zod';
import {
  BlockResponseSchema,
  HeadResponseSchema,
  PoolResponseSchema,
  type Block,
  type HeadSnapshot,
  type PoolSnapshot,
} from '../schemas/ledger.js';

export interface SubmitResult {
  accepted: boolean;
  /** HTTP status, when a response arrived */
  status?: number;
  error?: string;
}

export interface LedgerClient {
  getHead(): Promise<HeadSnapshot>;
  /** Resolves null when the ledger has no such block */
  getBlock(hash: string): Promise<Block | null>;
  getPool(): Promise<PoolSnapshot>;
  /** Never rejects: a failed request is a rejected submission */
  submitBlock(block: Block): Promise<SubmitResult>;
}

export class LedgerRequestError extends Error {
  readonly url: string;
  readonly status?: number;

  constructor(message: string, url: string, status?: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'LedgerRequestError';
    this.url = url;
    this.status = status;
  }
}

export class LedgerResponseError extends Error {
  readonly url: string;
  readonly issues: ZodIssue[];

  constructor(url: string, issues: ZodIssue[]) {
    const summary = issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    super(`Unexpected response from ${url}: ${summary}`);
    this.name = 'LedgerResponseError';
    this.url = url;
    this.issues = issues;
  }
}

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface HttpLedgerConfig {
  /** Base URL of the ledger service (e.g., http://localhost) */
  baseUrl: string;
  /** Per-request timeout (default: 5000) */
  timeoutMs?: number;
  /** Defaults to the global fetch */
  fetch?: FetchLike;
}

export class HttpLedgerClient implements LedgerClient {
  private baseUrl: string;
  private timeoutMs: number;
  private fetchImpl: FetchLike;

  constructor(config: HttpLedgerConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.timeoutMs = config.timeoutMs ?? 5000;
    this.fetchImpl = config.fetch ?? ((input, init) => fetch(input, init));
  }

  async getHead(): Promise<HeadSnapshot> {
    return this.getJson('/block', HeadResponseSchema);
  }

  async getBlock(hash: string): Promise<Block | null> {
    const body = await this.getJson(`/block?hash=${encodeURIComponent(hash)}`, BlockResponseSchema);
    return body.block ?? null;
  }

  async getPool(): Promise<PoolSnapshot> {
    return this.getJson('/txpool', PoolResponseSchema);
  }

  async submitBlock(block: Block): Promise<SubmitResult> {
    const url = `${this.baseUrl}/block`;
    try {
      const res = await this.fetchImpl(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', 'Accept': 'application/json' },
        body: JSON.stringify(block),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      if (res.ok) {
        return { accepted: true, status: res.status };
      }
      const text = await res.text().catch(() => '');
      return { accepted: false, status: res.status, error: text || res.statusText };
    } catch (err) {
      return { accepted: false, error: err instanceof Error ? err.message : String(err) };
    }
  }

  private async getJson<T>(path: string, schema: ZodType<T, ZodTypeDef, unknown>): Promise<T> {
    const url = `${this.baseUrl}${path}`;
    let res: Response;
    try {
      res = await this.fetchImpl(url, {
        headers: { 'Accept': 'application/json' },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new LedgerRequestError(`Request to ${url} failed: ${reason}`, url, undefined, { cause: err });
    }

    if (!res.ok) {
      throw new LedgerRequestError(`Request to ${url} failed: ${res.status}`, url, res.status);
    }

    let data: unknown;
    try {
      data = await res.json();
    } catch (err) {
      throw new LedgerRequestError(`Response from ${url} is not JSON`, url, res.status, { cause: err });
    }

    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      throw new LedgerResponseError(url, parsed.error.issues);
    }
    return parsed.data;
  }
}
