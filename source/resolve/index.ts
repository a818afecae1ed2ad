export {TermResolutionEngine, rankCandidates, type Segment} from './engine.js';
