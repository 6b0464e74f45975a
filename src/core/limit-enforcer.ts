import { SKIP_REASONS, type ClassifiedRecord, type LimitPolicy } from "./types.js";

/**
 * Decide which records get follow-up this run.
 *
 * New records are admitted in input order (id order, as produced by
 * `classify`) up to `maxNewPerRun`; a limit of 0 or less pauses new intake.
 * Updated records are always admitted, unchanged ones never are.
 */
export function enforce(classified: readonly ClassifiedRecord[], policy: LimitPolicy): ClassifiedRecord[] {
	let admittedNew = 0;

	return classified.map((item) => {
		switch (item.status) {
			case "updated":
				return { ...item, admitted: true, skipReason: null };
			case "unchanged":
				return { ...item, admitted: false, skipReason: null };
			case "new":
				if (admittedNew < policy.maxNewPerRun) {
					admittedNew++;
					return { ...item, admitted: true, skipReason: null };
				}
				return { ...item, admitted: false, skipReason: SKIP_REASONS.newRecordLimit };
		}
	});
}
