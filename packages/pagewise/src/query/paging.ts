import { z } from "zod";

import { validateInput } from "../errors/validation";
import { type Paging } from "./ast";

const pagingSchema = z.object({
  limit: z.number().int().nonnegative(),
  offset: z.number().int().nonnegative(),
});

/**
 * Creates a paging value.
 *
 * @throws ValidationError for negative or non-integer values
 */
export function createPaging(limit: number, offset = 0): Paging {
  return Object.freeze(validateInput(pagingSchema, { limit, offset }, "paging"));
}
