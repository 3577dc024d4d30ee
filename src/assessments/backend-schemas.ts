import { z } from "zod";
import { BackendError } from "../errors.js";

export const optionalText = z
  .string()
  .nullish()
  .transform((value) => value ?? "");

export const idText = z.union([z.string(), z.number()]).transform(String);

export const pageSchema = <T extends z.ZodTypeAny>(item: T) =>
  z.object({
    items: z
      .array(item)
      .nullish()
      .transform((value) => value ?? []),
    TotalPage: z.number().int().nullish(),
  });

// Item lists where one bad entry should not sink the rest.
export const looseItemsSchema = z.object({
  items: z
    .array(z.unknown())
    .nullish()
    .transform((value) => value ?? []),
});

export function parseOrThrow<T extends z.ZodTypeAny>(schema: T, response: unknown, what: string): z.output<T> {
  const parsed = schema.safeParse(response);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new BackendError(`Malformed ${what} response${issue ? ` at ${issue.path.join(".")}: ${issue.message}` : ""}`);
  }
  return parsed.data;
}

/** Parses each item on its own and keeps those that fit `schema`. */
export function validItems<T extends z.ZodTypeAny>(schema: T, items: unknown[]): Array<z.output<T>> {
  const kept: Array<z.output<T>> = [];
  for (const item of items) {
    const parsed = schema.safeParse(item);
    if (parsed.success) kept.push(parsed.data);
  }
  return kept;
}
