import { InvalidInputError, type AudioInfo } from '@pcm2upd/core'
import { UPD7759_SAMPLE_RATES, type Upd7759SampleRate } from './types'

function isUpd7759SampleRate(sampleRate: number): sampleRate is Upd7759SampleRate {
	return UPD7759_SAMPLE_RATES.some((rate) => rate === sampleRate)
}

/**
 * Check that decoded audio can be fed to the encoder
 * Rejects anything other than mono 16-bit PCM at 5, 6 or 8 kHz
 */
export function validatePcmInput(info: AudioInfo): Upd7759SampleRate {
	const { sampleRate } = info
	if (!isUpd7759SampleRate(sampleRate)) {
		throw new InvalidInputError('Only sample rates of 5khz, 6khz, or 8khz are supported.')
	}

	if (info.numChannels !== 1) {
		throw new InvalidInputError('Only single channel audio is supported.')
	}

	if (info.encoding !== 'pcm' || info.bitsPerSample !== 16) {
		throw new InvalidInputError('Audio data must be 16-bit PCM.')
	}

	return sampleRate
}
