/**
 * Redis Module
 *
 * @module redis
 */

export * from './redis-connection';
