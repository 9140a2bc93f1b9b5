// ─── GovernanceClient ──────────────────────────────────────────────────────
// Dependency-free client for the stake-weighted governance API.
// Uses the runtime's fetch; a custom implementation can be injected.
// ────────────────────────────────────────────────────────────────────────────

import type {
  APIErrorEnvelope,
  CreateProposalOpts,
  CreateProposalResponse,
  CustodyBalance,
  ExecutableResponse,
  HealthResponse,
  ListProposalsOpts,
  ParticipantProfile,
  Proposal,
  RegisterParticipantResponse,
  StakeBalance,
  StakeReceipt,
  Vote,
} from './types.js';

export class GovernanceAPIError extends Error {
  constructor(
    public readonly status: number,
    public readonly code: string,
    message: string,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = 'GovernanceAPIError';
  }
}

export interface GovernanceClientOptions {
  /** Base URL of the API server (e.g. "http://localhost:8787"). */
  baseUrl: string;
  /** Participant API key, required for staking, proposing, voting and executing. */
  apiKey?: string;
  /** Optional custom fetch implementation (defaults to globalThis.fetch). */
  fetch?: typeof globalThis.fetch;
}

const isErrorEnvelope = (value: unknown): value is APIErrorEnvelope => (
  typeof value === 'object'
  && value !== null
  && 'error' in value
  && typeof value.error === 'object'
  && value.error !== null
);

export class GovernanceClient {
  private readonly baseUrl: string;
  private readonly apiKey?: string;
  private readonly _fetch: typeof globalThis.fetch;

  constructor(baseUrl: string, apiKey?: string);
  constructor(opts: GovernanceClientOptions);
  constructor(baseUrlOrOpts: string | GovernanceClientOptions, apiKey?: string) {
    if (typeof baseUrlOrOpts === 'string') {
      this.baseUrl = baseUrlOrOpts.replace(/\/+$/, '');
      this.apiKey = apiKey;
      this._fetch = globalThis.fetch;
    } else {
      this.baseUrl = baseUrlOrOpts.baseUrl.replace(/\/+$/, '');
      this.apiKey = baseUrlOrOpts.apiKey;
      this._fetch = baseUrlOrOpts.fetch ?? globalThis.fetch;
    }
  }

  /** Same server, different identity. */
  withApiKey(apiKey: string): GovernanceClient {
    return new GovernanceClient({ baseUrl: this.baseUrl, apiKey, fetch: this._fetch });
  }

  // ─── Internal helpers ──────────────────────────────────────────────────

  private headers(): Record<string, string> {
    const h: Record<string, string> = { 'content-type': 'application/json' };
    if (this.apiKey) h['authorization'] = `Bearer ${this.apiKey}`;
    return h;
  }

  private async request<T>(method: string, path: string, body?: unknown): Promise<T> {
    const url = `${this.baseUrl}${path}`;
    const res = await this._fetch(url, {
      method,
      headers: this.headers(),
      body: body !== undefined ? JSON.stringify(body) : undefined,
    });

    if (!res.ok) {
      let errorBody: unknown;
      try {
        errorBody = await res.json();
      } catch {
        errorBody = undefined;
      }
      const envelope = isErrorEnvelope(errorBody) ? errorBody.error : undefined;
      throw new GovernanceAPIError(
        res.status,
        envelope?.code ?? `HTTP_${res.status}`,
        envelope?.message ?? `Request failed: ${method} ${path} → ${res.status}`,
        envelope?.details,
      );
    }

    return (await res.json()) as T;
  }

  private get<T>(path: string): Promise<T> {
    return this.request<T>('GET', path);
  }

  private post<T>(path: string, body?: unknown): Promise<T> {
    return this.request<T>('POST', path, body ?? {});
  }

  // ─── Participants ──────────────────────────────────────────────────────

  /** Register a participant. The returned apiKey is shown once. */
  async registerParticipant(name: string): Promise<RegisterParticipantResponse> {
    return this.post<RegisterParticipantResponse>('/participants/register', { name });
  }

  async getParticipant(principal: string): Promise<ParticipantProfile> {
    return this.get<ParticipantProfile>(`/participants/${encodeURIComponent(principal)}`);
  }

  // ─── Stake ─────────────────────────────────────────────────────────────

  async stake(amount: number): Promise<StakeReceipt> {
    return this.post<StakeReceipt>('/stake', { amount });
  }

  async getStake(principal: string): Promise<StakeBalance> {
    return this.get<StakeBalance>(`/stakes/${encodeURIComponent(principal)}`);
  }

  async getTotalStaked(): Promise<number> {
    const res = await this.get<{ totalStaked: number }>('/stakes/total');
    return res.totalStaked;
  }

  // ─── Proposals ─────────────────────────────────────────────────────────

  async createProposal(opts: CreateProposalOpts): Promise<CreateProposalResponse> {
    return this.post<CreateProposalResponse>('/proposals', opts);
  }

  async listProposals(opts: ListProposalsOpts = {}): Promise<Proposal[]> {
    const params = new URLSearchParams();
    if (opts.phase) params.set('phase', opts.phase);
    if (opts.creator) params.set('creator', opts.creator);
    const qs = params.toString();
    const res = await this.get<{ proposals: Proposal[] }>(`/proposals${qs ? `?${qs}` : ''}`);
    return res.proposals;
  }

  /** Resolves to null for an unknown proposal. */
  async getProposal(proposalId: number): Promise<Proposal | null> {
    try {
      const res = await this.get<{ proposal: Proposal }>(`/proposals/${proposalId}`);
      return res.proposal;
    } catch (error) {
      if (error instanceof GovernanceAPIError && error.status === 404) return null;
      throw error;
    }
  }

  async isExecutable(proposalId: number): Promise<boolean> {
    const res = await this.get<ExecutableResponse>(`/proposals/${proposalId}/executable`);
    return res.executable;
  }

  async executeProposal(proposalId: number): Promise<Proposal> {
    const res = await this.post<{ proposal: Proposal }>(`/proposals/${proposalId}/execute`);
    return res.proposal;
  }

  // ─── Votes ─────────────────────────────────────────────────────────────

  async vote(proposalId: number, support: boolean): Promise<Vote> {
    const res = await this.post<{ vote: Vote }>(`/proposals/${proposalId}/votes`, { support });
    return res.vote;
  }

  async listVotes(proposalId: number): Promise<Vote[]> {
    const res = await this.get<{ votes: Vote[] }>(`/proposals/${proposalId}/votes`);
    return res.votes;
  }

  /** Resolves to null when the principal has not voted. */
  async getVote(proposalId: number, principal: string): Promise<Vote | null> {
    try {
      const res = await this.get<{ vote: Vote }>(`/proposals/${proposalId}/votes/${encodeURIComponent(principal)}`);
      return res.vote;
    } catch (error) {
      if (error instanceof GovernanceAPIError && error.status === 404) return null;
      throw error;
    }
  }

  // ─── Custody / clock / system ──────────────────────────────────────────

  async creditCustody(amount: number): Promise<CustodyBalance> {
    return this.post<CustodyBalance>('/custody/credit', { amount });
  }

  async getCustodyBalance(principal: string): Promise<CustodyBalance> {
    return this.get<CustodyBalance>(`/custody/${encodeURIComponent(principal)}`);
  }

  async getHeight(): Promise<number> {
    const res = await this.get<{ height: number }>('/clock');
    return res.height;
  }

  async advanceClock(blocks = 1): Promise<number> {
    const res = await this.post<{ height: number }>('/clock/advance', { blocks });
    return res.height;
  }

  async health(): Promise<HealthResponse> {
    return this.get<HealthResponse>('/health');
  }
}
