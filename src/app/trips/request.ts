import { z } from "zod";
import { parseDay, toIsoDay } from "../../lib/dates";
import { SERVICE_TYPES } from "../../types/dto";

export const DEFAULT_PAGE_SIZE = 100;
export const MAX_PAGE_SIZE = 1000;

// "YYYY-MM-DD" or "DD/MM/YYYY", normalized to "YYYY-MM-DD"
const day = z.string().transform((raw, ctx) => {
	const parsed = parseDay(raw);
	if (!parsed) {
		ctx.addIssue({
			code: z.ZodIssueCode.custom,
			message: 'Expected "YYYY-MM-DD" or "DD/MM/YYYY"',
		});
		return z.NEVER;
	}
	return toIsoDay(parsed);
});

export const tripsQuerySchema = z
	.object({
		start_date: day,
		end_date: day,
		service_type: z.enum(SERVICE_TYPES).optional(),
		borough: z.string().trim().min(1).optional(),
		page: z.coerce.number().int().min(1).default(1),
		page_size: z.coerce
			.number()
			.int()
			.min(1)
			.max(MAX_PAGE_SIZE)
			.default(DEFAULT_PAGE_SIZE),
	})
	// The row offset has to stay an exact integer for the store
	.refine((q) => (q.page - 1) * q.page_size <= Number.MAX_SAFE_INTEGER, {
		message: "page is too large for page_size",
		path: ["page"],
	});

export type TripsQuery = z.infer<typeof tripsQuerySchema>;
