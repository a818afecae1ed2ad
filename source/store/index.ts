export {SqliteVocabularyStore, escapeLike} from './sqlite.js';
export * from './types.js';
