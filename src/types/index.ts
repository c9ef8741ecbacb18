export type * from './case-record.js';
export type * from './locator.js';
export type * from './capture.js';
export type * from './workflow.js';
export type * from './site-profile.js';
