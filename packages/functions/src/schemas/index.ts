export * from './health-report.schema.js';
