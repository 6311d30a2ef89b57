/**
 * Domain model exports.
 */

export * from './artifact';
export * from './errors';
export * from './request';
export * from './run';
