/**
 * UPD7759 lookup tables
 * Internal to the encoder; not re-exported from the package
 */

import tables from './tables.json'

function freezeRow(row: readonly number[], length: number, name: string): readonly number[] {
	if (row.length !== length || !row.every(Number.isInteger)) {
		throw new Error(`Corrupt UPD7759 table: ${name}`)
	}
	return Object.freeze([...row])
}

/** Step table, indexed [state][code] */
export const STEP_TABLE: readonly (readonly number[])[] = Object.freeze(
	(() => {
		if (tables.step.length !== 16) throw new Error('Corrupt UPD7759 table: step')
		return tables.step.map((row, i) => freezeRow(row, 16, `step[${i}]`))
	})()
)

/** State transition table, indexed by code */
export const STATE_TRANSITION_TABLE: readonly number[] = freezeRow(
	tables.stateTransition,
	16,
	'stateTransition'
)
