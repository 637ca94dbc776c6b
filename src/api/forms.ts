import type { FastifyRequest } from "fastify";
import { z } from "zod";
import type { UploadedFile } from "../images/store.js";

export interface ParsedForm {
  fields: Record<string, string>;
  // Only file inputs that were actually filled in (non-empty filename)
  files: Map<string, UploadedFile>;
}

/**
 * Reads a url-encoded or multipart form into string fields and files.
 * A repeated url-encoded field keeps its last value.
 */
export async function readForm(req: FastifyRequest): Promise<ParsedForm> {
  const fields: Record<string, string> = {};
  const files = new Map<string, UploadedFile>();

  if (req.isMultipart()) {
    for await (const part of req.parts()) {
      if (part.type === "file") {
        const data = await part.toBuffer();
        if (part.filename) {
          files.set(part.fieldname, { filename: part.filename, data });
        }
      } else if (typeof part.value === "string") {
        fields[part.fieldname] = part.value;
      }
    }
    return { fields, files };
  }

  if (req.body && typeof req.body === "object") {
    for (const [key, value] of Object.entries(req.body)) {
      if (typeof value === "string") {
        fields[key] = value;
      } else if (Array.isArray(value)) {
        const last: unknown = value[value.length - 1];
        if (typeof last === "string") fields[key] = last;
      }
    }
  }

  return { fields, files };
}

/** Taken exactly as typed; a whitespace-only name counts as blank. */
export const usernameField = z
  .string()
  .min(1)
  .refine((value) => value.trim().length > 0);

const idParam = z.object({
  id: z.string().regex(/^\d+$/).transform(Number),
});

/** Numeric `:id` route param, or null when it is not a positive integer. */
export function parseId(params: unknown): number | null {
  const parsed = idParam.safeParse(params);
  return parsed.success && parsed.data.id > 0 ? parsed.data.id : null;
}
