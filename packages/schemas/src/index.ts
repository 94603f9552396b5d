/**
 * @parlance/schemas
 *
 * Zod schemas shared by the parlance packages.
 *
 * @packageDocumentation
 */

export * from './public/locale/index.js';
