export {LanceVectorIndex} from './lancedb.js';
export {createPointSchema} from './schema.js';
export type {PointPayload, VectorHit, VectorIndex, VectorPoint} from './types.js';
