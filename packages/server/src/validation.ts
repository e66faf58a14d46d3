import { z } from "zod";
import type { JsonValue, TokenMetadata } from "@vtt/shared";

export const RoleSchema = z.enum(["gm", "player"]);

export const IdSchema = z.number().int().positive();

const coordinate = z.number().finite();

export const Vec2Schema = z.object({ x: coordinate, y: coordinate });

export const PointsSchema = z.array(Vec2Schema);

const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ])
);

export const TokenMetadataSchema: z.ZodType<TokenMetadata, z.ZodTypeDef, unknown> = z
  .object({
    v: z.literal(1).optional(),
    name: z.string().optional(),
    notes: z.string().optional(),
    hidden: z.boolean().optional(),
  })
  .catchall(JsonValueSchema);

// HTTP bodies

const CREDENTIALS_REQUIRED = "Username and password are required";

export const LoginBodySchema = z.object({
  username: z.string({ required_error: CREDENTIALS_REQUIRED, invalid_type_error: CREDENTIALS_REQUIRED }).min(1, CREDENTIALS_REQUIRED),
  password: z.string({ required_error: CREDENTIALS_REQUIRED, invalid_type_error: CREDENTIALS_REQUIRED }).min(1, CREDENTIALS_REQUIRED),
});

export const RegisterBodySchema = LoginBodySchema.extend({
  role: z
    .enum(["gm", "player"], { errorMap: () => ({ message: 'Role must be either "gm" or "player"' }) })
    .default("player"),
});

export const CreateSceneBodySchema = z.object({
  name: z
    .string({ required_error: "Scene name is required", invalid_type_error: "Scene name is required" })
    .trim()
    .min(1, "Scene name is required")
    .max(100, "Scene name must be at most 100 characters"),
  thumbnail_path: z
    .string({ invalid_type_error: "Thumbnail path must be a string" })
    .trim()
    .min(1, "Thumbnail path must not be empty")
    .max(500, "Thumbnail path must be at most 500 characters")
    .nullish()
    .transform((value) => value ?? null),
});

// Realtime payloads

export const TokenMovedSchema = z.object({
  t: z.literal("token_moved"),
  token_id: IdSchema,
  x: coordinate,
  y: coordinate,
  rotation: coordinate.nullish(),
  scale: z.number().finite().positive().nullish(),
});

export const TokenCreatedSchema = z.object({
  t: z.literal("token_created"),
  layer_id: IdSchema,
  image_path: z.string().min(1),
  x: coordinate,
  y: coordinate,
  scale: z.number().finite().positive().default(1),
  rotation: coordinate.default(0),
  z_index: z.number().int().default(0),
  metadata: TokenMetadataSchema.nullable().default(null),
});

export const DrawingCreatedSchema = z.object({
  t: z.literal("drawing_created"),
  layer_id: IdSchema,
  type: z.enum(["free", "line", "rectangle", "circle"]),
  points: PointsSchema,
  color: z.string().min(1),
  stroke_width: z.number().finite().positive().default(1),
});

export const TextCreatedSchema = z.object({
  t: z.literal("text_created"),
  layer_id: IdSchema,
  x: coordinate,
  y: coordinate,
  text: z.string(),
  font_size: z.number().int().positive().default(12),
  color: z.string().min(1).default("#000000"),
  style: z.enum(["normal", "bold", "italic", "bold-italic"]).default("normal"),
});

export const ClientMessageSchema = z.discriminatedUnion("t", [
  z.object({ t: z.literal("ping") }),
  TokenMovedSchema,
  TokenCreatedSchema,
  DrawingCreatedSchema,
  TextCreatedSchema,
]);

export type TokenMovedInput = z.infer<typeof TokenMovedSchema>;
export type TokenCreatedInput = z.infer<typeof TokenCreatedSchema>;
export type DrawingCreatedInput = z.infer<typeof DrawingCreatedSchema>;
export type TextCreatedInput = z.infer<typeof TextCreatedSchema>;
export type ClientMessage = z.infer<typeof ClientMessageSchema>;

/**
 * Message of the first issue of a failed parse. HTTP schemas carry their own
 * wording; realtime payloads are reported with the offending field.
 */
export function issueMessage(error: z.ZodError, withPath = false): string {
  const issue = error.issues[0];
  if (!issue) return "Invalid request";
  if (!withPath || issue.path.length === 0) return issue.message;
  return `${issue.path.join(".")}: ${issue.message}`;
}
