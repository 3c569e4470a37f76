/**
 * Decision corpus pipeline
 */

export * from './identifiers/sources';
export * from './portal/types';
export * from './portal/client';
export * from './portal/fetch-stage';
export * from './store/content-store';
export * from './store/text-store';
export * from './store/record-store';
export * from './store/pg-record-store';
export * from './store/db';
export * from './extraction/cleanup';
export * from './extraction/quality';
export * from './extraction/pdf';
export * from './extraction/ocr';
export * from './extraction/extraction-stage';
export * from './normalization/fields';
export * from './normalization/normalize';
export * from './state/transitions';
export * from './state/state-store';
export * from './state/file-state-store';
export * from './state/pg-state-store';
export * from './coordinator';
export * from './pool';
export * from './checkpoint';
export * from './export';
export * from './factory';
