// Every stage of the trips pipeline that can fail; the controller maps all of
// them to the same empty page
export const TripQueryFailure = {
	Predicate: "PREDICATE_FAILED",
	Count: "COUNT_QUERY_FAILED",
	Page: "PAGE_QUERY_FAILED",
	Mapping: "MAPPING_FAILED",
} as const;

export type TripQueryFailureKind =
	(typeof TripQueryFailure)[keyof typeof TripQueryFailure];

export class TripQueryError extends Error {
	readonly kind: TripQueryFailureKind;

	constructor(kind: TripQueryFailureKind, cause: unknown) {
		super(
			`${kind}: ${cause instanceof Error ? cause.message : String(cause)}`,
			{ cause },
		);
		this.name = "TripQueryError";
		this.kind = kind;
	}
}
