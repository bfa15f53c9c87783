/**
 * PROGNOSIS MODULE — Index
 */

export * from './prognosis.types.js';
export * from './prognosis.encoder.js';
export * from './prognosis.validator.js';
export * from './prognosis.predictor.js';
export * from './prognosis.formatter.js';
export { registerPrognosisRoutes } from './prognosis.routes.js';
export type { PrognosisRouteDeps } from './prognosis.routes.js';
