/**
 * @cae/cad - CAD session adapters and geometry scoring
 */

export * from './mock/MockCadSession.js';
export * from './freecad/FreeCadBridge.js';
export * from './freecad/FreeCadSession.js';
export * from './geometry/geometry-stats.js';
export * from './geometry/GeometryQualityScorer.js';
