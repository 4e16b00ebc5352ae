import { z } from "zod";
import { ContentGraphError, type ErrorCode } from "@threadline/shared";

export const ContentSchema = z
  .string()
  .refine((value) => value.trim().length > 0, { message: "content_required" });

export const IdSchema = z.string().min(1);

export const UuidSchema = z.string().uuid();

export const isUuid = (value: string) => UuidSchema.safeParse(value).success;

// Row ids live in uuid columns: anything else cannot name a stored row.
export const requireUuid = (value: string, notFound: ErrorCode) => {
  if (!isUuid(value)) {
    throw new ContentGraphError({ code: notFound });
  }
  return value;
};

export const parseInput = <T extends z.ZodTypeAny>(schema: T, input: unknown): z.infer<T> => {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ContentGraphError({
      code: "invalid_request",
      details: issue ? `${issue.path.join(".") || "input"}: ${issue.message}` : undefined
    });
  }
  return parsed.data;
};
