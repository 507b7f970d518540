import type { GroupRemovalMode } from "@walletgate/shared";
import { withTimeout } from "../chain/timeout.js";
import type { ChainDataProvider } from "../chain/types.js";
import type { GroupRepository } from "../storage/index.js";
import type { GroupBinding, GroupSyncResult, WalletRef } from "./types.js";

export interface GroupSyncOptions {
  /** Per-strategy timeout in milliseconds */
  timeoutMs: number;
  removal: GroupRemovalMode;
}

/**
 * Evaluates group strategies for a wallet and reconciles stored memberships.
 *
 * Strategies run in parallel, each under its own timeout. A strategy that
 * throws or times out is reported in `failed` and its group is left as it
 * was. Storage errors propagate once every strategy has finished.
 */
export class GroupMembershipEngine {
  constructor(
    private groups: GroupRepository,
    private bindings: readonly GroupBinding[],
    private provider: ChainDataProvider,
    private options: GroupSyncOptions
  ) {}

  get size(): number {
    return this.bindings.length;
  }

  async syncGroups(wallet: WalletRef, provider: ChainDataProvider = this.provider): Promise<GroupSyncResult> {
    const current = new Set(await this.groups.listGroups(wallet.address));
    const result: GroupSyncResult = { added: [], removed: [], unchanged: [], failed: [], groups: [] };

    const settled = await Promise.allSettled(
      this.bindings.map(async ({ name, manager }) => {
        await this.groups.ensureGroup(name);

        let member: boolean;
        try {
          member = await withTimeout(
            manager.isMember(wallet, provider),
            this.options.timeoutMs,
            `Membership check timed out after ${this.options.timeoutMs}ms`
          );
        } catch (err) {
          const message = err instanceof Error ? err.message : String(err);
          console.warn(`[Groups] Check for "${name}" failed for ${wallet.address}: ${message}`);
          result.failed.push({ group: name, code: "CHAIN_PROVIDER_UNAVAILABLE", message });
          return;
        }

        const wasMember = current.has(name);
        if (member && !wasMember) {
          await this.groups.addMember(name, wallet.address);
          result.added.push(name);
        } else if (!member && wasMember && this.options.removal === "eager") {
          await this.groups.removeMember(name, wallet.address);
          result.removed.push(name);
        } else {
          result.unchanged.push(name);
        }
      })
    );
    for (const outcome of settled) {
      if (outcome.status === "rejected") throw outcome.reason;
    }

    result.added.sort();
    result.removed.sort();
    result.unchanged.sort();
    result.failed.sort((a, b) => a.group.localeCompare(b.group));
    result.groups = await this.groups.listGroups(wallet.address);

    if (result.added.length > 0 || result.removed.length > 0) {
      console.log(
        `[Groups] ${wallet.address}: +[${result.added.join(", ")}] -[${result.removed.join(", ")}]`
      );
    }
    return result;
  }
}
