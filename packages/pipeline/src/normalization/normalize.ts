/**
 * Normalization Stage
 *
 * normalize(envelope, textRef) -> StructuredRecord. Pure: the same envelope,
 * references and options always produce the same record. The only failure is
 * an envelope without a usable ADA; every other defect degrades the record
 * and shows up in fieldStatus, flags and completeness.
 */

import {
  config,
  logger,
  recordCompletenessCounter,
  validateStructuredRecord,
  ValidationError,
  type CanonicalField,
  type Completeness,
  type ExtractedTextRef,
  type FieldStatus,
  type MetadataEnvelope,
  type RawDocumentRef,
  type RecordFlag,
  type StructuredRecord,
} from '@decision-corpus/shared';
import decisionTypeCatalogue from '../../data/decision-types.json';
import type { RecordStore } from '../store/record-store';
import {
  collectAmounts,
  normalizeTags,
  parseDate,
  parseOrganizationId,
  parseStringList,
  parseText,
  parseUnitIds,
  type FieldResult,
} from './fields';
import { isRecord } from '../lib/files';

export const DECISION_TYPES: ReadonlyMap<string, string> = new Map(
  decisionTypeCatalogue.map((entry) => [entry.code, entry.label])
);

/** Fields counted towards completeness */
export const EXPECTED_FIELDS: readonly CanonicalField[] = [
  'protocolNumber',
  'issueDate',
  'subject',
  'organizationId',
  'decisionType',
  'signatories',
  'financialAmounts',
  'extractedText',
];

/** Fields that identify a decision to a human reader */
export const CORE_FIELDS: readonly CanonicalField[] = ['issueDate', 'subject', 'protocolNumber', 'organizationId'];

export interface NormalizeOptions {
  timeZone?: string;
  /** Becomes `normalizedAt`; the pipeline passes the raw document's retrieval time */
  now?: Date;
  /** Extraction ended in ExtractionError; the record is built without text */
  extractionFailed?: boolean;
  decisionTypes?: ReadonlyMap<string, string>;
}

function isAbsentStatus(status: FieldStatus): boolean {
  return status === 'missing' || status === 'invalid';
}

export function computeCompleteness(fieldStatus: Record<CanonicalField, FieldStatus>): Completeness {
  const absent = EXPECTED_FIELDS.filter((field) => isAbsentStatus(fieldStatus[field]));
  if (absent.length === 0) {
    return 'complete';
  }
  if (CORE_FIELDS.every((field) => isAbsentStatus(fieldStatus[field]))) {
    return 'minimal';
  }
  return 'partial';
}

function parseDecisionType(value: unknown, catalogue: ReadonlyMap<string, string>): FieldResult<string | null> {
  const parsed = parseText(value);
  if (parsed.value === null) {
    return parsed;
  }
  const code = parsed.value.toUpperCase();
  return catalogue.has(code) ? { value: code, status: 'present' } : { value: null, status: 'invalid' };
}

/** `tags` arrives either as a list or as `{ tag: [...] }` */
function tagList(value: unknown): unknown {
  return isRecord(value) && 'tag' in value ? value.tag : value;
}

function parseFinancialAmounts(envelope: MetadataEnvelope): FieldResult<StructuredRecord['financialAmounts']> & {
  unparsable: number;
} {
  const sources = [envelope.financialAmounts, envelope.extraFieldValues].filter(
    (source) => source !== undefined && source !== null
  );
  if (sources.length === 0) {
    return { value: [], status: 'missing', unparsable: 0 };
  }
  const { amounts, unparsable } = collectAmounts(sources);
  if (amounts.length > 0) {
    return { value: amounts, status: 'present', unparsable };
  }
  return { value: [], status: unparsable > 0 ? 'invalid' : 'empty', unparsable };
}

function textStatus(textRef: ExtractedTextRef | null): FieldStatus {
  if (!textRef) {
    return 'missing';
  }
  return textRef.qualityClass === 'empty' ? 'empty' : 'present';
}

/**
 * Map a metadata envelope (plus artifact references) to a StructuredRecord.
 */
export function normalize(
  envelope: MetadataEnvelope,
  textRef: ExtractedTextRef | null,
  rawRef: RawDocumentRef | null,
  options: NormalizeOptions = {}
): StructuredRecord {
  const ada = typeof envelope.ada === 'string' ? envelope.ada.normalize('NFC').trim() : '';
  if (ada === '') {
    throw new ValidationError('Metadata envelope has no decision identifier', ['/ada: missing']);
  }

  const timeZone = options.timeZone ?? config.portalTimeZone;
  const catalogue = options.decisionTypes ?? DECISION_TYPES;

  const protocolNumber = parseText(envelope.protocolNumber);
  const issueDate = parseDate(envelope.issueDate, timeZone);
  const subject = parseText(envelope.subject);
  const organizationId = parseOrganizationId(envelope.organizationId);
  const unitIds = parseUnitIds(envelope.unitIds);
  const signatories = parseStringList(envelope.signerIds ?? envelope.signatories);
  const decisionType = parseDecisionType(envelope.decisionTypeId ?? envelope.decisionType, catalogue);
  const financialAmounts = parseFinancialAmounts(envelope);
  const classificationTags = normalizeTags(envelope.thematicCategoryIds, tagList(envelope.tags));

  const fieldStatus: Record<CanonicalField, FieldStatus> = {
    protocolNumber: protocolNumber.status,
    issueDate: issueDate.status,
    subject: subject.status,
    organizationId: organizationId.status,
    unitIds: unitIds.status,
    signatories: signatories.status,
    decisionType: decisionType.status,
    financialAmounts: financialAmounts.status,
    classificationTags: classificationTags.status,
    extractedText: textStatus(textRef),
  };

  const flags = new Set<RecordFlag>();
  if (organizationId.nonconforming.length > 0) flags.add('organization_id_nonconforming');
  if (unitIds.nonconforming.length > 0) flags.add('unit_id_nonconforming');
  if (financialAmounts.unparsable > 0) flags.add('amount_unparsable');
  if (decisionType.status === 'invalid') flags.add('decision_type_unknown');
  if (options.extractionFailed) flags.add('extraction_failed');
  if (textRef?.qualityClass === 'low') flags.add('low_quality_text');

  return {
    schemaVersion: '1.0.0',
    ada,
    protocolNumber: protocolNumber.value,
    issueDate: issueDate.value,
    subject: subject.value,
    organizationId: organizationId.value,
    unitIds: unitIds.value,
    signatories: signatories.value,
    decisionType: decisionType.value,
    financialAmounts: financialAmounts.value,
    classificationTags: classificationTags.value,
    extractedTextRef: textRef ? { ...textRef } : null,
    rawDocumentRef: rawRef ? { ...rawRef } : null,
    completeness: computeCompleteness(fieldStatus),
    fieldStatus,
    flags: [...flags].sort(),
    normalizedAt: (options.now ?? new Date()).toISOString(),
  };
}

/**
 * Normalize, validate against the published schema and replace the stored
 * record.
 */
export class NormalizationStage {
  constructor(
    private readonly recordStore: RecordStore,
    private readonly options: Omit<NormalizeOptions, 'extractionFailed' | 'now'> = {}
  ) {}

  async run(
    envelope: MetadataEnvelope,
    textRef: ExtractedTextRef | null,
    rawRef: RawDocumentRef | null,
    extractionFailed = false,
    asOf?: Date
  ): Promise<StructuredRecord> {
    const record = normalize(envelope, textRef, rawRef, { ...this.options, extractionFailed, now: asOf });

    const validation = validateStructuredRecord(record);
    if (!validation.valid) {
      throw new ValidationError(`StructuredRecord for ${record.ada} violates its schema`, validation.errors ?? []);
    }

    await this.recordStore.put(record);
    recordCompletenessCounter.inc({ completeness: record.completeness });

    const missing = Object.entries(record.fieldStatus)
      .filter(([, status]) => isAbsentStatus(status))
      .map(([field]) => field);
    logger.info('Normalized record', {
      completeness: record.completeness,
      missing_fields: missing,
      flags: record.flags,
    });

    return record;
  }
}
