/**
 * tbforge plan — Public API
 */

export { buildGenerationPlan, specFromPlan, DEFAULT_CATALOG } from './build-plan.js';
export type { CatalogEntry } from './build-plan.js';
