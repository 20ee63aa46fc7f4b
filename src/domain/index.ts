/**
 * Domain model exports.
 */

export * from './async-polling';
export * from './errors';
export * from './execution';
export * from './remote-file';
export * from './sandbox-run';
export * from './workflow';
