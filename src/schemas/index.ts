export * from './case-record.schema.js';
export * from './site-profile.schema.js';
export * from './entity-tables.schema.js';
export * from './config.schema.js';
