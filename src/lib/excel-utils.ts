export * from './excel-types';
export * from './excel-helpers';
export * from './excel-style';
export * from './excel-value-classifier';
export * from './excel-merge-index';
export * from './excel-region-detector';
export * from './excel-block-splitter';
export * from './excel-template-filler';
export * from './excel-footer-updater';
export * from './excel-numeric-formatter';
export * from './excel-raw-metadata';
export * from './excel-table-config';
export * from './excel-table-pipeline';
export * from './excel-sheet-merger';
export * from './excel-file-discovery';
export * from './excel-raw-import';
export * from './excel-workbook-store';
export * from './excel-batch-runner';
