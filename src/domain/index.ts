/**
 * Domain model exports.
 */

export * from './account';
export * from './cycle';
export * from './errors';
export * from './identity';
