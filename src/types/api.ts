/**
 * API Request/Response Types
 */

import type { Domain, TransactionAction } from "./canonical.js";

// ============================================================================
// Common Response Types
// ============================================================================

export interface ApiError {
  error: string;
  message: string;
  details?: Record<string, unknown>;
  requestId?: string;
}

// ============================================================================
// Ledger Types
// ============================================================================

export interface TransactionDto {
  id: number;
  domain: Domain;
  source: string;
  occurredAt: string;
  externalId: string;
  logIndex: number;
  baseAsset: string;
  quoteAsset: string;
  action: TransactionAction;
  amount: number;
  price: number | null;
  feeAsset: string | null;
  feeAmount: number | null;
  counterpartyFrom: string | null;
  counterpartyTo: string | null;
  chain: string | null;
  year: number;
  month: number;
}

export interface WatermarkDto {
  source: string;
  domain: Domain;
  lastSyncAt: string | null;
  lastRunRecordCount: number;
  lastRunStatus: "success" | "failed";
  lastError: string | null;
  updatedAt: string;
}
