/**
 * @media-scribe/shared-infrastructure
 *
 * Environment parsing helpers used by the backend configuration layer.
 */

export * from './env/loaders.js';
