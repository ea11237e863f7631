import { PublicKey, SystemProgram, Transaction, type TransactionInstruction } from "@solana/web3.js";
import type { PoolInfo, PoolLedger, PublicKeyLike } from "./types.js";

interface VaultPool {
  vault: PublicKey;
  lamports: bigint;
}

/**
 * Ledger for native SOL pools held in vault accounts. The asset handle of a
 * pool is its vault address, and a vault backs at most one pool. Transfers
 * debit the tracked vault balance and queue a SystemProgram transfer;
 * `buildTransaction` drains the queue into a transaction for the vault to
 * sign and send.
 */
export class SolanaPayoutLedger implements PoolLedger {
  private readonly pools = new Map<string, VaultPool>();
  private pending: TransactionInstruction[] = [];

  addVault(poolId: string, vault: PublicKeyLike, lamports: bigint): void {
    if (this.pools.has(poolId)) {
      throw new Error(`Pool ${poolId} already exists`);
    }
    const key = new PublicKey(vault);
    for (const [id, pool] of this.pools) {
      if (pool.vault.equals(key)) {
        throw new Error(`Vault ${vault} already backs pool ${id}`);
      }
    }
    this.pools.set(poolId, { vault: key, lamports });
  }

  getPoolInfo(poolId: string): PoolInfo {
    const pool = this.pools.get(poolId);
    if (!pool) {
      throw new Error(`Pool ${poolId} not found`);
    }
    return { assetHandle: pool.vault.toBase58(), balance: pool.lamports };
  }

  transfer(assetHandle: string, to: PublicKeyLike, amount: bigint): void {
    const pool = Array.from(this.pools.values()).find(p => p.vault.toBase58() === assetHandle);
    if (!pool) {
      throw new Error(`No vault for asset ${assetHandle}`);
    }
    if (amount < 0n || pool.lamports < amount) {
      throw new Error("Insufficient vault balance");
    }
    const instruction = SystemProgram.transfer({
      fromPubkey: pool.vault,
      toPubkey: new PublicKey(to),
      lamports: amount
    });
    pool.lamports -= amount;
    this.pending.push(instruction);
  }

  pendingInstructions(): TransactionInstruction[] {
    return [...this.pending];
  }

  /** Drains queued transfers of one vault into a transaction paid by that vault. */
  buildTransaction(poolId: string, recentBlockhash?: string): Transaction {
    const pool = this.pools.get(poolId);
    if (!pool) {
      throw new Error(`Pool ${poolId} not found`);
    }
    const mine = this.pending.filter(ix => ix.keys[0]?.pubkey.equals(pool.vault));
    this.pending = this.pending.filter(ix => !mine.includes(ix));

    const tx = new Transaction({ feePayer: pool.vault });
    if (recentBlockhash) tx.recentBlockhash = recentBlockhash;
    if (mine.length > 0) tx.add(...mine);
    return tx;
  }
}
