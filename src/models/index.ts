/**
 * Central export for all Mongoose models
 */

export * from './postpaid-user.schema';
export * from './prepaid-user.schema';
export * from './retired-user-key.schema';
