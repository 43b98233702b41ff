// ─── GovernanceOracleClient ────────────────────────────────────────────────
// Lightweight, zero-dependency client for the governance & oracle HTTP API.
// Uses native fetch (Node.js 20+).
// ────────────────────────────────────────────────────────────────────────────

import type {
  APIErrorEnvelope,
  DelegationResponse,
  GovernanceParameters,
  HealthResponse,
  OracleConfig,
  OracleSourceInput,
  PriceResponse,
  PricesResponse,
  Proposal,
  ProposeOpts,
  ReceiptResponse,
  SourcesResponse,
  VoteOpts,
} from './types.js';

export class GovernanceOracleApiError extends Error {
  constructor(
    public readonly status: number,
    public readonly code: string,
    message: string,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = 'GovernanceOracleApiError';
  }
}

export interface GovernanceOracleClientOptions {
  /** Base URL of the API server (e.g. "http://localhost:8790"). */
  baseUrl: string;
  /** Sent as x-caller-address; required for admin operations. */
  caller?: string;
  /** Optional custom fetch implementation (defaults to globalThis.fetch). */
  fetch?: typeof globalThis.fetch;
}

const seg = (value: string | number): string => encodeURIComponent(String(value));

export class GovernanceOracleClient {
  private readonly baseUrl: string;
  private readonly caller?: string;
  private readonly _fetch: typeof globalThis.fetch;

  constructor(opts: GovernanceOracleClientOptions) {
    this.baseUrl = opts.baseUrl.replace(/\/+$/, '');
    this.caller = opts.caller;
    this._fetch = opts.fetch ?? globalThis.fetch;
  }

  /** Same server, different caller identity. */
  as(caller: string): GovernanceOracleClient {
    return new GovernanceOracleClient({ baseUrl: this.baseUrl, caller, fetch: this._fetch });
  }

  // ─── Internal helpers ──────────────────────────────────────────────────

  // The server refuses an empty body declared as JSON, so bodyless calls
  // carry no content-type.
  private headers(hasBody: boolean): Record<string, string> {
    const h: Record<string, string> = {};
    if (hasBody) h['content-type'] = 'application/json';
    if (this.caller) h['x-caller-address'] = this.caller;
    return h;
  }

  private async request<T>(method: string, path: string, body?: unknown): Promise<T> {
    const url = `${this.baseUrl}${path}`;
    const res = await this._fetch(url, {
      method,
      headers: this.headers(body !== undefined),
      body: body !== undefined ? JSON.stringify(body) : undefined,
    });

    if (!res.ok) {
      let errorBody: APIErrorEnvelope | undefined;
      try {
        errorBody = (await res.json()) as APIErrorEnvelope;
      } catch {
        // response body may not be JSON
      }
      throw new GovernanceOracleApiError(
        res.status,
        errorBody?.error?.code ?? `HTTP_${res.status}`,
        errorBody?.error?.message ?? `Request failed: ${method} ${path} → ${res.status}`,
        errorBody?.error?.details,
      );
    }

    return (await res.json()) as T;
  }

  // ─── Governance ────────────────────────────────────────────────────────

  async propose(opts: ProposeOpts): Promise<Proposal> {
    const res = await this.request<{ proposal: Proposal }>('POST', '/governance/proposals', opts);
    return res.proposal;
  }

  async getProposal(id: number): Promise<Proposal> {
    const res = await this.request<{ proposal: Proposal }>('GET', `/governance/proposals/${seg(id)}`);
    return res.proposal;
  }

  async vote(id: number, opts: VoteOpts): Promise<Proposal> {
    const res = await this.request<{ proposal: Proposal }>('POST', `/governance/proposals/${seg(id)}/votes`, {
      ...opts,
      weight: String(opts.weight),
    });
    return res.proposal;
  }

  async getReceipt(id: number, voter: string): Promise<ReceiptResponse> {
    return this.request<ReceiptResponse>('GET', `/governance/proposals/${seg(id)}/receipts/${seg(voter)}`);
  }

  async queue(id: number): Promise<Proposal> {
    const res = await this.request<{ proposal: Proposal }>('POST', `/governance/proposals/${seg(id)}/queue`);
    return res.proposal;
  }

  async execute(id: number): Promise<Proposal> {
    const res = await this.request<{ proposal: Proposal }>('POST', `/governance/proposals/${seg(id)}/execute`);
    return res.proposal;
  }

  async delegate(from: string, to: string): Promise<DelegationResponse> {
    return this.request<DelegationResponse>('PUT', `/governance/delegations/${seg(from)}`, { to });
  }

  async getDelegate(from: string): Promise<DelegationResponse> {
    return this.request<DelegationResponse>('GET', `/governance/delegations/${seg(from)}`);
  }

  async getParameters(): Promise<GovernanceParameters> {
    return this.request<GovernanceParameters>('GET', '/governance/parameters');
  }

  async setQuorumBps(quorumBps: number): Promise<GovernanceParameters> {
    return this.request<GovernanceParameters>('PUT', '/governance/parameters/quorum', { quorumBps });
  }

  async setTimelock(timelockSeconds: number): Promise<GovernanceParameters> {
    return this.request<GovernanceParameters>('PUT', '/governance/parameters/timelock', { timelockSeconds });
  }

  // ─── Oracle ────────────────────────────────────────────────────────────

  async getSources(asset: string): Promise<SourcesResponse> {
    return this.request<SourcesResponse>('GET', `/oracle/assets/${seg(asset)}/sources`);
  }

  async setSource(asset: string, source: OracleSourceInput): Promise<SourcesResponse> {
    return this.request<SourcesResponse>('PUT', `/oracle/assets/${seg(asset)}/sources`, {
      ...source,
      weight: String(source.weight),
    });
  }

  async removeSource(asset: string, address: string): Promise<SourcesResponse> {
    return this.request<SourcesResponse>('DELETE', `/oracle/assets/${seg(asset)}/sources/${seg(address)}`);
  }

  async fetchPrices(asset: string): Promise<PricesResponse> {
    return this.request<PricesResponse>('GET', `/oracle/assets/${seg(asset)}/prices`);
  }

  async aggregatePrice(asset: string): Promise<PriceResponse> {
    return this.request<PriceResponse>('GET', `/oracle/assets/${seg(asset)}/price`);
  }

  async getOracleConfig(): Promise<OracleConfig> {
    return this.request<OracleConfig>('GET', '/oracle/config');
  }

  async setHeartbeatTtl(heartbeatTtlSeconds: number): Promise<OracleConfig> {
    return this.request<OracleConfig>('PUT', '/oracle/config/heartbeat-ttl', { heartbeatTtlSeconds });
  }

  async setMode(mode: number): Promise<OracleConfig> {
    return this.request<OracleConfig>('PUT', '/oracle/config/mode', { mode });
  }

  // ─── System ────────────────────────────────────────────────────────────

  async health(): Promise<HealthResponse> {
    return this.request<HealthResponse>('GET', '/health');
  }
}
