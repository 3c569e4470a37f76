/**
 * Portal (Diavgeia opendata) response shapes.
 *
 * Only the fields the pipeline relies on are typed; everything else in a
 * decision is kept verbatim in the MetadataEnvelope.
 */

export interface PortalDecisionSummary {
  ada: string;
  issueDate?: number | string;
  documentUrl?: string;
  [field: string]: unknown;
}

export interface PortalSearchInfo {
  page: number;
  size: number;
  actualSize: number;
  total: number;
}

export interface PortalSearchResponse {
  decisions: PortalDecisionSummary[];
  info: PortalSearchInfo;
}

export interface PortalSearchQuery {
  fromDate?: string;
  toDate?: string;
  organizationId?: string;
  page: number;
  size: number;
}

export interface FetchedDocument {
  bytes: Buffer;
  sourceUrl: string;
  contentType: string;
  retrievedAt: string;
}
