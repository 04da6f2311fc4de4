/**
 * Data Source
 */

export * from './ItemCollection.js';
