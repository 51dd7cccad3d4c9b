/**
 * Service Lifecycle Module
 *
 * Shutdown handling, health server and entry point wrapper.
 *
 * @module service-lifecycle
 */

export * from './service-bootstrap';
