import { MEDIA_FORMATS, MEDIA_KINDS, SEASON_NAMES, SOURCE_NAMES, SourceError } from "@animanga/core";
import { z } from "zod";

const upper = (value: unknown) => (typeof value === "string" ? value.trim().toUpperCase() : value);
const lower = (value: unknown) => (typeof value === "string" ? value.trim().toLowerCase() : value);

export const kindSchema = z.preprocess(upper, z.enum(MEDIA_KINDS));

export const sourceSchema = z.preprocess(lower, z.enum(SOURCE_NAMES));

export const seasonSchema = z.preprocess(upper, z.enum(SEASON_NAMES));

export const limitSchema = z.number().int().positive();

export const idSchema = z.number().int().positive();

export const formatSchema = z.preprocess(upper, z.enum(MEDIA_FORMATS));

export const formatsSchema = z.array(formatSchema).max(10);

export function parseInput<S extends z.ZodTypeAny>(schema: S, args: unknown): z.output<S> {
  const parsed = schema.safeParse(args ?? {});
  if (!parsed.success) {
    const message = parsed.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
      .join("; ");
    throw new SourceError("INVALID_ARG", message, { source: "local" });
  }
  return parsed.data;
}
