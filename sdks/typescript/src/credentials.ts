import { AuthError } from "./errors";

export interface Credential {
  readonly accessToken: string;
  readonly refreshToken?: string;
  /** Epoch milliseconds. Absent means the credential does not expire. */
  readonly expiresAt?: number;
}

/**
 * Supplies the bearer credential attached to every outgoing request.
 * Implementations must never resolve to an expired credential.
 */
export interface CredentialSupplier {
  token(): Promise<Credential>;
}

/**
 * Wraps a single credential with no way to renew it. Once a recorded expiry
 * has passed every call rejects.
 */
export class StaticCredentialSupplier implements CredentialSupplier {
  private readonly credential: Credential;
  private readonly now: () => number;

  constructor(credential: string | Credential, now: () => number = Date.now) {
    this.credential = typeof credential === "string" ? { accessToken: credential } : credential;
    this.now = now;
  }

  async token(): Promise<Credential> {
    const { expiresAt } = this.credential;
    if (expiresAt !== undefined && this.now() >= expiresAt) {
      throw new AuthError("Credential has expired and cannot be refreshed");
    }
    return this.credential;
  }
}

export type RefreshFn = (current: Credential) => Promise<Credential>;

export interface RefreshingCredentialOptions {
  credential: Credential;
  refresh: RefreshFn;
  /** Renew this long before the recorded expiry. Defaults to 60s. */
  skewMs?: number;
  now?: () => number;
}

const DEFAULT_SKEW_MS = 60_000;

/**
 * Holds a credential and renews it through `refresh` once it is about to
 * expire. Concurrent callers during a renewal share the same pending refresh.
 */
export class RefreshingCredentialSupplier implements CredentialSupplier {
  private current: Credential;
  private pending?: Promise<Credential>;
  private readonly refresh: RefreshFn;
  private readonly skewMs: number;
  private readonly now: () => number;

  constructor(options: RefreshingCredentialOptions) {
    this.current = options.credential;
    this.refresh = options.refresh;
    this.skewMs = options.skewMs ?? DEFAULT_SKEW_MS;
    this.now = options.now ?? Date.now;
  }

  async token(): Promise<Credential> {
    if (!this.isExpired(this.current)) {
      return this.current;
    }
    if (!this.pending) {
      this.pending = this.renew().finally(() => {
        this.pending = undefined;
      });
    }
    return this.pending;
  }

  private isExpired(credential: Credential): boolean {
    if (credential.expiresAt === undefined) {
      return false;
    }
    return this.now() >= credential.expiresAt - this.skewMs;
  }

  private async renew(): Promise<Credential> {
    let next: Credential;
    try {
      next = await this.refresh(this.current);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new AuthError(`Credential refresh failed: ${reason}`, { cause: error });
    }
    if (!next.accessToken) {
      throw new AuthError("Credential refresh returned no access token");
    }
    if (this.isExpired(next)) {
      throw new AuthError("Credential refresh returned an expired credential");
    }
    this.current = next;
    return next;
  }
}

/**
 * Normalises the `credentials` client option. A credential record is renewed
 * through `refresh` when one is given and held as-is otherwise.
 */
export function toCredentialSupplier(
  source: string | Credential | CredentialSupplier,
  refresh?: RefreshFn,
): CredentialSupplier {
  if (typeof source === "string") {
    return new StaticCredentialSupplier(source);
  }
  if ("token" in source) {
    return source;
  }
  if (refresh) {
    return new RefreshingCredentialSupplier({ credential: source, refresh });
  }
  return new StaticCredentialSupplier(source);
}
