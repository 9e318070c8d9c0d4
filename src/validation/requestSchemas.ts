import { z } from "zod";
import { ValidationError } from "../errors/DispatchError";
import { CreatePlanRequest } from "../dtos/plan/create-plan.request";
import { ImportPlanRequest } from "../dtos/plan/import-plan.request";
import { DispatchEventRequest } from "../dtos/event/dispatch-event.request";

const idSchema = z
  .number({ invalid_type_error: "Id must be a number" })
  .int("Id must be an integer")
  .nonnegative("Id must not be negative")
  .max(Number.MAX_SAFE_INTEGER, "Id must be a safe integer");

const uniqueIds = (ids: number[]): boolean => new Set(ids).size === ids.length;

export const createPlanSchema = z.object({
  riders: z.array(idSchema).refine(uniqueIds, "Rider ids must be unique"),
  orders: z.array(idSchema).refine(uniqueIds, "Order ids must be unique"),
}) satisfies z.ZodType<CreatePlanRequest>;

// Duplicates inside the snapshot are reported by the plan importer
export const importPlanSchema = z.object({
  riders: z.array(
    z.object({
      riderId: idSchema,
      orderIds: z.array(idSchema),
    })
  ),
}) satisfies z.ZodType<ImportPlanRequest>;

export const dispatchEventSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("rider_rejected"),
    riderId: idSchema,
    orderId: idSchema,
  }),
  z.object({
    type: z.literal("order_canceled"),
    orderId: idSchema,
  }),
]) satisfies z.ZodType<DispatchEventRequest>;

/**
 * Parse an untrusted request body
 * @throws ValidationError listing every issue found
 */
export function parseRequest<S extends z.ZodTypeAny>(
  schema: S,
  body: unknown
): z.infer<S> {
  const result = schema.safeParse(body);
  if (!result.success) {
    throw new ValidationError(
      result.error.issues.map((issue) => ({
        path: issue.path.join(".") || "(body)",
        message: issue.message,
      }))
    );
  }
  return result.data;
}
