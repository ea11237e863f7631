import type {
  AuthorizationOracle,
  PoolInfo,
  PoolLedger,
  Profile,
  ProfileDirectory,
  PublicKeyLike
} from "./types.js";

/**
 * Capability oracle backed by a simple allow-list.
 * Revoked grants stay on record with `active: false`.
 */
export class AllowListOracle implements AuthorizationOracle {
  private readonly grants = new Map<string, Map<PublicKeyLike, boolean>>();

  constructor(initial: Record<string, PublicKeyLike[]> = {}) {
    for (const [capabilityId, identities] of Object.entries(initial)) {
      for (const identity of identities) this.grantCapability(capabilityId, identity);
    }
  }

  hasCapability(identity: PublicKeyLike, capabilityId: string): boolean {
    return this.grants.get(capabilityId)?.get(identity) === true;
  }

  grantCapability(capabilityId: string, identity: PublicKeyLike): void {
    this.setCapabilityStatus(capabilityId, identity, true);
  }

  setCapabilityStatus(capabilityId: string, identity: PublicKeyLike, active: boolean): void {
    let holders = this.grants.get(capabilityId);
    if (!holders) {
      holders = new Map();
      this.grants.set(capabilityId, holders);
    }
    holders.set(identity, active);
  }
}

export interface TransferRecord {
  poolId: string;
  asset: string;
  to: PublicKeyLike;
  amount: bigint;
}

interface AssetPool {
  asset: string;
  balance: bigint;
}

/**
 * Pools keyed by id, each holding one asset. A pool's asset handle is
 * `${poolId}:${asset}`, so two pools of the same asset never share one.
 * `transfer` debits the pool behind the handle and credits the destination's
 * balance of that asset.
 */
export class InMemoryPoolLedger implements PoolLedger {
  private readonly pools = new Map<string, AssetPool>();
  private readonly handles = new Map<string, string>();
  private readonly balances = new Map<string, bigint>();
  private readonly transfers: TransferRecord[] = [];
  /** Called after each transfer has been applied; lets tests re-enter the caller */
  onTransfer?: (record: TransferRecord) => void;

  createPool(poolId: string, asset: string, balance: bigint): void {
    if (this.pools.has(poolId)) {
      throw new Error(`Pool ${poolId} already exists`);
    }
    if (balance < 0n) {
      throw new Error("Pool balance must be >= 0");
    }
    this.pools.set(poolId, { asset, balance });
    this.handles.set(`${poolId}:${asset}`, poolId);
  }

  getPoolInfo(poolId: string): PoolInfo {
    const pool = this.pools.get(poolId);
    if (!pool) {
      throw new Error(`Pool ${poolId} not found`);
    }
    return { assetHandle: `${poolId}:${pool.asset}`, balance: pool.balance };
  }

  transfer(assetHandle: string, to: PublicKeyLike, amount: bigint): void {
    const poolId = this.handles.get(assetHandle);
    const pool = poolId === undefined ? undefined : this.pools.get(poolId);
    if (poolId === undefined || !pool) {
      throw new Error(`Unknown asset handle ${assetHandle}`);
    }
    if (amount < 0n || pool.balance < amount) {
      throw new Error("Insufficient pool balance");
    }
    pool.balance -= amount;
    const key = `${pool.asset}:${to}`;
    this.balances.set(key, (this.balances.get(key) ?? 0n) + amount);
    const record = { poolId, asset: pool.asset, to, amount };
    this.transfers.push(record);
    this.onTransfer?.(record);
  }

  balanceOf(asset: string, owner: PublicKeyLike): bigint {
    return this.balances.get(`${asset}:${owner}`) ?? 0n;
  }

  getTransfers(): TransferRecord[] {
    return [...this.transfers];
  }
}

export class InMemoryProfileDirectory implements ProfileDirectory {
  private readonly profiles = new Map<PublicKeyLike, Profile>();
  private readonly members = new Map<string, Set<PublicKeyLike>>();

  addProfile(anchor: PublicKeyLike, profile: Profile, members: PublicKeyLike[] = []): void {
    this.profiles.set(anchor, profile);
    this.members.set(profile.id, new Set(members));
  }

  getProfileByAnchor(anchor: PublicKeyLike): Profile | undefined {
    return this.profiles.get(anchor);
  }

  isOwnerOrMember(profileId: string, identity: PublicKeyLike): boolean {
    for (const profile of this.profiles.values()) {
      if (profile.id === profileId && profile.owner === identity) return true;
    }
    return this.members.get(profileId)?.has(identity) ?? false;
  }
}
