const utcDay = (yyyy: number, mm: number, dd: number): Date | undefined => {
	const d = new Date(Date.UTC(yyyy, mm - 1, dd, 0, 0, 0));
	// Reject rollovers such as 31/02
	if (
		d.getUTCFullYear() !== yyyy ||
		d.getUTCMonth() !== mm - 1 ||
		d.getUTCDate() !== dd
	) {
		return undefined;
	}
	return d;
};

// Parse a calendar date
// Accepts: "YYYY-MM-DD" or "DD/MM/YYYY"
export const parseDay = (input: string): Date | undefined => {
	const s = input.trim();

	const m1 = /^(\d{4})-(\d{2})-(\d{2})$/.exec(s); // YYYY-MM-DD
	if (m1) {
		const [, yyyy, mm, dd] = m1;
		return utcDay(Number(yyyy), Number(mm), Number(dd));
	}

	const m2 = /^(\d{2})\/(\d{2})\/(\d{4})$/.exec(s); // DD/MM/YYYY
	if (m2) {
		const [, dd, mm, yyyy] = m2;
		return utcDay(Number(yyyy), Number(mm), Number(dd));
	}

	return undefined;
};

// "YYYY-MM-DD HH:MM[:SS[.fff]]" (or T separator), optional "Z" / "+HH:MM"
const DATE_TIME =
	/^(\d{4}-\d{2}-\d{2})[T ](\d{2}):(\d{2})(?::(\d{2})(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})?$/;

// Parse a timestamp coming from the store
// Only the formats above and plain days are accepted; no zone means UTC
export const parseTimestamp = (input: unknown): Date | undefined => {
	if (input instanceof Date) {
		return isNaN(input.getTime()) ? undefined : input;
	}
	if (typeof input !== "string") return undefined;

	const s = input.trim();
	if (!s) return undefined;

	// Plain day -> UTC midnight
	const day = parseDay(s);
	if (day) return day;

	const m = DATE_TIME.exec(s);
	if (!m) return undefined;
	const [, datePart = "", hh, mi, ss = "00", fraction = "", zone = "Z"] = m;

	// Calendar part must be a real day
	if (!parseDay(datePart)) return undefined;
	if (Number(hh) > 23 || Number(mi) > 59 || Number(ss) > 59) return undefined;

	// "+0500" -> "+05:00"
	const tz = zone.length === 5 ? `${zone.slice(0, 3)}:${zone.slice(3)}` : zone;
	const d = new Date(`${datePart}T${hh}:${mi}:${ss}${fraction}${tz}`);
	return isNaN(d.getTime()) ? undefined : d;
};

// Date -> "YYYY-MM-DD"
export const toIsoDay = (d: Date): string => d.toISOString().slice(0, 10);

// "YYYY-MM-DD" -> the following day, same format
// Undefined past 9999-12-31, which has no four-digit successor
export const nextIsoDay = (isoDay: string): string | undefined => {
	const d = parseDay(isoDay);
	if (!d) throw new Error(`Invalid date: ${isoDay}`);
	d.setUTCDate(d.getUTCDate() + 1);
	if (d.getUTCFullYear() > 9999) return undefined;
	return toIsoDay(d);
};
