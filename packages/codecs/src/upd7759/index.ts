export {
	createEncoderState,
	encodeSample,
	encodeSamples,
	encodeUpd7759,
	getUpd7759Size,
	packUpd7759,
	resolveFrequencyMarker,
	sampleRateForMarker,
} from './encoder'
export { isUpd7759, parseUpd7759Info } from './parser'
export {
	FrequencyMarker,
	UPD7759_BLOCK_SIZE,
	UPD7759_MAX_STATE,
	UPD7759_SAMPLE_RATES,
	type EncoderState,
	type FrequencyMarkerValue,
	type Upd7759EncodeOptions,
	type Upd7759Info,
	type Upd7759SampleRate,
} from './types'
export { validatePcmInput } from './validate'
