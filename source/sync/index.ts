export {
	VocabularySynchronizer,
	type ClearResult,
	type ImportResult,
	type ResyncResult,
	type SynchronizerOptions,
} from './synchronizer.js';
export {
	parseStandardFieldInput,
	parseWordRootInput,
	standardFieldInputSchema,
	wordRootInputSchema,
} from './validation.js';
export {
	standardFieldPoint,
	standardFieldText,
	wordRootPoint,
	wordRootText,
} from './points.js';
