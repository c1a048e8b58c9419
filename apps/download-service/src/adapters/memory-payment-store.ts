import * as fs from "node:fs";
import type { PaymentMetadata, PaymentStore } from "@urlseal/sdk";
import { z } from "zod";

const paymentRecordSchema = z.object({
  id: z.number().int().nonnegative(),
  email: z.string().email(),
  purchase_key: z.string().min(1),
});

export type PaymentRecord = z.infer<typeof paymentRecordSchema>;

export class MemoryPaymentStore implements PaymentStore {
  private readonly payments = new Map<number, PaymentMetadata>();
  private readonly paymentIdsByKey = new Map<string, number>();

  constructor(records: readonly PaymentRecord[] = []) {
    for (const record of records) {
      this.add(record);
    }
  }

  static fromFile(filePath: string): MemoryPaymentStore {
    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(filePath, "utf8"));
    } catch (error) {
      throw new Error(`Failed to read payments file ${filePath}: ${String(error)}`);
    }
    const records = z.array(paymentRecordSchema).safeParse(parsed);
    if (!records.success) {
      throw new Error(`Invalid payments file ${filePath}: ${records.error.issues[0]?.message ?? "unknown error"}`);
    }
    try {
      return new MemoryPaymentStore(records.data);
    } catch (error) {
      throw new Error(`Invalid payments file ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  /** Throws when the purchase key already belongs to another payment. */
  add(record: PaymentRecord): void {
    const owner = this.paymentIdsByKey.get(record.purchase_key);
    if (owner !== undefined && owner !== record.id) {
      throw new Error(`Purchase key is already assigned to payment ${owner}`);
    }
    const previous = this.payments.get(record.id);
    if (previous) {
      this.paymentIdsByKey.delete(previous.purchaseKey);
    }
    this.payments.set(record.id, { email: record.email, purchaseKey: record.purchase_key });
    this.paymentIdsByKey.set(record.purchase_key, record.id);
  }

  remove(paymentId: number): void {
    const existing = this.payments.get(paymentId);
    if (existing) {
      if (this.paymentIdsByKey.get(existing.purchaseKey) === paymentId) {
        this.paymentIdsByKey.delete(existing.purchaseKey);
      }
      this.payments.delete(paymentId);
    }
  }

  get size(): number {
    return this.payments.size;
  }

  async findPaymentIdByPurchaseKey(purchaseKey: string): Promise<number | null> {
    return this.paymentIdsByKey.get(purchaseKey) ?? null;
  }

  async getPaymentMetadata(paymentId: number): Promise<PaymentMetadata | null> {
    return this.payments.get(paymentId) ?? null;
  }
}
