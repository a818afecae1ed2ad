/**
 * Arrow schema for LanceDB vocabulary collections.
 */

import {Field, FixedSizeList, Float32, Int32, Schema, Utf8} from 'apache-arrow';
import {DEFAULT_EMBEDDING_DIMENSIONS} from '../lib/constants.js';

/**
 * Arrow schema shared by the word_roots and standard_fields collections.
 *
 * The payload column holds the display fields as a JSON object so both
 * collections share one layout.
 */
export function createPointSchema(
	dimensions: number = DEFAULT_EMBEDDING_DIMENSIONS,
): Schema {
	return new Schema([
		new Field('id', new Int32(), false), // vocabulary id
		new Field(
			'vector',
			new FixedSizeList(dimensions, new Field('item', new Float32(), false)),
			false,
		),
		new Field('payload', new Utf8(), false),
	]);
}
