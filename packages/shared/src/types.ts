/**
 * Shared TypeScript Types
 *
 * Types for the decision corpus pipeline, matching JSON schemas in docs/contracts/
 */

import type { ErrorInfo } from './errors';

// ============================================================================
// Identifiers
// ============================================================================

/** ADA: the portal's unique posting identifier. */
export type DecisionIdentifier = string;

// ============================================================================
// Raw Documents (Content Store)
// ============================================================================

export interface RawDocument {
  ada: DecisionIdentifier;
  /** 1-based, increases by one per distinct content hash */
  version: number;
  /** `sha256:<hex>` */
  hash: string;
  sizeBytes: number;
  sourceUrl: string;
  contentType: string;
  retrievedAt: string;
  /** Path relative to the dataset root */
  path: string;
  /** Path of the metadata envelope fetched together with this version */
  metadataPath: string | null;
}

/** Pointer stored in PipelineState and StructuredRecord */
export interface RawDocumentRef {
  version: number;
  hash: string;
  path: string;
  sourceUrl: string;
}

// ============================================================================
// Metadata Envelope (portal detail response, read-only)
// ============================================================================

export interface MetadataEnvelope {
  ada?: unknown;
  [field: string]: unknown;
}

// ============================================================================
// Extracted Text
// ============================================================================

export type ExtractionMethod = 'native' | 'ocr';

export type QualityClass = 'high' | 'medium' | 'low' | 'empty';

export interface ExtractedText {
  ada: DecisionIdentifier;
  rawHash: string;
  method: ExtractionMethod;
  text: string;
  pageCount: number;
  charCount: number;
  /** 0..1 heuristic */
  quality: number;
  qualityClass: QualityClass;
  extractorVersion: string;
  /** Path relative to the dataset root */
  path: string;
  createdAt: string;
  warnings: string[];
}

export interface ExtractedTextRef {
  path: string;
  method: ExtractionMethod;
  rawHash: string;
  quality: number;
  qualityClass: QualityClass;
}

// ============================================================================
// Structured Record (published unit of truth)
// ============================================================================

export type Completeness = 'complete' | 'partial' | 'minimal';

/**
 * present: parsed from the envelope
 * empty:   present in the envelope but genuinely empty (e.g. no amounts)
 * missing: absent from the envelope
 * invalid: present but unparsable
 */
export type FieldStatus = 'present' | 'empty' | 'missing' | 'invalid';

export type CanonicalField =
  | 'protocolNumber'
  | 'issueDate'
  | 'subject'
  | 'organizationId'
  | 'unitIds'
  | 'signatories'
  | 'decisionType'
  | 'financialAmounts'
  | 'classificationTags'
  | 'extractedText';

export interface FinancialAmount {
  /** Fixed-point decimal string with two fraction digits, e.g. "1234.50" */
  amount: string;
  currency: string;
}

export type RecordFlag =
  | 'organization_id_nonconforming'
  | 'unit_id_nonconforming'
  | 'amount_unparsable'
  | 'decision_type_unknown'
  | 'extraction_failed'
  | 'low_quality_text';

export interface StructuredRecord {
  schemaVersion: '1.0.0';
  ada: DecisionIdentifier;
  protocolNumber: string | null;
  issueDate: string | null;
  subject: string | null;
  organizationId: string | null;
  unitIds: string[];
  signatories: string[];
  decisionType: string | null;
  financialAmounts: FinancialAmount[];
  classificationTags: string[];
  extractedTextRef: ExtractedTextRef | null;
  rawDocumentRef: RawDocumentRef | null;
  completeness: Completeness;
  fieldStatus: Record<CanonicalField, FieldStatus>;
  flags: RecordFlag[];
  normalizedAt: string;
}

// ============================================================================
// Pipeline State (owned by the coordinator)
// ============================================================================

export type PipelineStage =
  | 'pending'
  | 'fetching'
  | 'fetched'
  | 'extracting'
  | 'extracted'
  | 'normalizing'
  | 'complete'
  | 'failed';

export interface Lease {
  owner: string;
  acquiredAt: string;
  expiresAt: string;
  /** Holder's process, so a lease left by a crashed process can be taken over early */
  pid?: number;
  hostname?: string;
}

export interface PipelineState {
  ada: DecisionIdentifier;
  stage: PipelineStage;
  /** Incremented on every write; compare-and-set key */
  revision: number;
  /** Attempts of the stage currently being worked on */
  attempts: number;
  lastError: ErrorInfo | null;
  failure: { stage: PipelineStage; error: ErrorInfo } | null;
  lease: Lease | null;
  rawDocument: RawDocumentRef | null;
  extractedText: ExtractedTextRef | null;
  /** Set when extraction failed terminally and normalization proceeds without text */
  extractionFailed: boolean;
  createdAt: string;
  updatedAt: string;
}

// ============================================================================
// Run Summary
// ============================================================================

export type ProcessOutcome = 'complete' | 'skipped' | 'in_flight' | 'failed' | 'cancelled';

export interface ProcessResult {
  ada: DecisionIdentifier;
  outcome: ProcessOutcome;
  stage: PipelineStage;
  reason?: string;
}

export interface RunSummary {
  processed: number;
  complete: number;
  skipped: number;
  inFlight: number;
  cancelled: number;
  failed: Array<{ ada: DecisionIdentifier; reason: string }>;
  aborted: boolean;
}

// ============================================================================
// API Types
// ============================================================================

export interface SyncRequest {
  since_cursor?: string | null;
  max_decisions?: number;
  from_date?: string;
  to_date?: string;
  refresh?: boolean;
}

export interface SyncResponse {
  correlation_id: string;
  enqueued: number;
  next_cursor: string | null;
}

export interface ErrorEnvelope {
  error: {
    code: string;
    message: string;
    correlation_id: string;
  };
}
