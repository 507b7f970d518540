import { isValidAddress, type Address } from "@walletgate/shared";
import type { ChainDataProvider, EnsProfile, EnsResolver } from "../chain/types.js";
import { withTimeout } from "../chain/timeout.js";
import { GroupMembershipEngine, type GroupBinding, type GroupSyncResult } from "../groups/index.js";
import type { AuthStorage } from "../storage/index.js";
import { NonceStore } from "./nonceStore.js";
import { SessionManager } from "./session.js";
import { SiweVerifier } from "./siweVerifier.js";
import {
  resolveAuthConfig,
  type AuthConfig,
  type AuthConfigInput,
  type Clock,
  type SessionHandle,
} from "./types.js";

/**
 * Collaborators injected into the auth service
 */
export interface AuthServiceDeps {
  storage: AuthStorage;
  chainProvider: ChainDataProvider;
  /** Omit to skip ENS enrichment regardless of config */
  ensResolver?: EnsResolver;
  groups?: readonly GroupBinding[];
  now?: Clock;
}

/**
 * Login result from POST /auth/login
 */
export interface LoginResult extends SessionHandle {
  groups: string[];
  ensName: string | null;
  /** Present when a group sync ran */
  groupSync: GroupSyncResult | null;
}

/**
 * Wallet profile from GET /auth/wallet/me
 */
export interface WalletProfile {
  address: Address;
  ensName: string | null;
  ensAvatar: string | null;
  isActive: boolean;
  groups: string[];
  createdAt: number;
  lastLoginAt: number | null;
}

/**
 * Authentication service: nonce issue, SIWE login, session lifecycle,
 * ENS enrichment and group sync.
 */
export class AuthService {
  readonly config: AuthConfig;
  private storage: AuthStorage;
  private nonceStore: NonceStore;
  private verifier: SiweVerifier;
  private sessionManager: SessionManager;
  private groupEngine: GroupMembershipEngine;
  private ensResolver: EnsResolver | undefined;

  constructor(config: AuthConfigInput, deps: AuthServiceDeps) {
    this.config = resolveAuthConfig(config);
    const now = deps.now ?? Date.now;

    this.storage = deps.storage;
    this.ensResolver = deps.ensResolver;
    this.nonceStore = new NonceStore(deps.storage.nonces, this.config.nonceTtlMs, now);
    this.verifier = new SiweVerifier(
      this.nonceStore,
      { domain: this.config.domain, uri: this.config.uri, clockSkewMs: this.config.clockSkewMs },
      now
    );
    this.sessionManager = new SessionManager(deps.storage.sessions, deps.storage.wallets, this.config, now);
    this.groupEngine = new GroupMembershipEngine(deps.storage.groups, deps.groups ?? [], deps.chainProvider, {
      timeoutMs: this.config.chainTimeoutMs,
      removal: this.config.groupRemoval,
    });
  }

  /**
   * Issue a login nonce (GET /auth/nonce)
   */
  async requestNonce(): Promise<{ nonce: string; expiresAt: number }> {
    const { nonce, expiresAt } = await this.nonceStore.issue();
    return { nonce, expiresAt };
  }

  /**
   * Verify a signed SIWE message and open a session (POST /auth/login)
   */
  async login(message: unknown, signature: unknown): Promise<LoginResult> {
    const identity = await this.verifier.verify(message, signature);
    const handle = await this.sessionManager.create(identity.address);

    try {
      const ensName = await this.refreshEnsProfile(identity.address);

      let groupSync: GroupSyncResult | null = null;
      let groups: string[];
      if (this.config.groupsOnAuth && this.groupEngine.size > 0) {
        groupSync = await this.groupEngine.syncGroups({ address: identity.address });
        groups = groupSync.groups;
      } else {
        groups = await this.storage.groups.listGroups(identity.address);
      }

      console.log(`[Auth] Login ${identity.address} (chain ${identity.chainId})`);
      return { ...handle, groups, ensName, groupSync };
    } catch (err) {
      // Do not leave a session behind for a login the caller sees as failed
      await this.sessionManager.destroy(handle.token);
      throw err;
    }
  }

  /**
   * Rotate a session (POST /auth/refresh)
   */
  async refresh(token: string): Promise<SessionHandle> {
    return this.sessionManager.refresh(token);
  }

  /**
   * Check a session (GET /auth/verify)
   */
  async verify(token: string): Promise<{ address: Address; expiresAt: number }> {
    const record = await this.sessionManager.verify(token);
    return { address: record.address, expiresAt: record.expiresAt };
  }

  /**
   * End a session (POST /auth/logout). Idempotent.
   */
  async logout(token: string): Promise<void> {
    await this.sessionManager.destroy(token);
  }

  /**
   * Profile of the wallet behind a session
   */
  async me(token: string): Promise<WalletProfile> {
    const { address } = await this.verify(token);
    return this.profile(address);
  }

  async profile(address: Address): Promise<WalletProfile> {
    const wallet = await this.storage.wallets.get(address);
    if (!wallet) {
      throw new Error(`Unknown wallet ${address}`);
    }

    return {
      address: wallet.address,
      ensName: wallet.ensName,
      ensAvatar: wallet.ensAvatar,
      isActive: wallet.isActive,
      groups: await this.storage.groups.listGroups(address),
      createdAt: wallet.createdAt,
      lastLoginAt: wallet.lastLoginAt,
    };
  }

  /**
   * Enable or disable a wallet. Disabling does not end open sessions.
   */
  async setWalletActive(address: string, isActive: boolean): Promise<void> {
    const normalized = address.toLowerCase();
    if (!isValidAddress(normalized)) {
      throw new Error(`Invalid address: ${address}`);
    }
    await this.storage.wallets.setActive(normalized, isActive);
  }

  /**
   * Purge expired nonces and sessions
   */
  async cleanup(): Promise<{ nonces: number; sessions: number }> {
    return {
      nonces: await this.nonceStore.cleanup(),
      sessions: await this.sessionManager.cleanup(),
    };
  }

  /**
   * Store the wallet's ENS name and avatar. Lookups are bounded by
   * `chainTimeoutMs`; failures are logged and keep whatever was stored before.
   */
  private async refreshEnsProfile(address: Address): Promise<string | null> {
    if (!this.config.ensProfileOnAuth || !this.ensResolver) {
      const wallet = await this.storage.wallets.get(address);
      return wallet?.ensName ?? null;
    }

    let profile: EnsProfile | null;
    try {
      profile = await withTimeout(
        this.ensResolver.resolve(address),
        this.config.chainTimeoutMs,
        `ENS lookup timed out after ${this.config.chainTimeoutMs}ms`
      );
    } catch (err) {
      console.warn(`[ENS] Lookup failed for ${address}: ${err instanceof Error ? err.message : String(err)}`);
      const wallet = await this.storage.wallets.get(address);
      return wallet?.ensName ?? null;
    }

    await this.storage.wallets.updateEnsProfile(address, profile?.name ?? null, profile?.avatar ?? null);
    return profile?.name ?? null;
  }
}
