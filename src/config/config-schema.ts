import { z } from "zod";

const positiveMs = z.number().int().positive();

/** Header names the client writes itself. */
export const RESERVED_HEADERS = ["host", "accept"] as const;

const headerName = z
  .string()
  .regex(/^[!#$%&'*+.^_`|~0-9A-Za-z-]+$/, "must be a valid HTTP header name")
  .refine(
    (name) => !(RESERVED_HEADERS as readonly string[]).includes(name.toLowerCase()),
    "cannot override a reserved header",
  );

const headerValue = z.string().refine((v) => !/[\r\n]/.test(v), "must not contain line breaks");

export const eventSourceOptionsSchema = z.object({
  connectTimeoutMs: positiveMs.optional(),
  headers: z.record(headerName, headerValue).optional(),
});
