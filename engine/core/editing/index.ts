/**
 * Editing Subsystem
 */

export * from './EditSessionManager.js';
