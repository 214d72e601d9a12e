import { Body, Param, Query } from "@nestjs/common";
import { z } from "zod";
import { ZodValidationPipe, type ZodValidationPipeOptions } from "../pipes/zod-validation.pipe";

/** Serial primary keys arrive as path strings. */
export const serialIdSchema = z.coerce.number().int().positive();

export function ZodBody<T>(
  schema: z.ZodType<T>,
  options?: ZodValidationPipeOptions,
): ParameterDecorator {
  return Body(new ZodValidationPipe(schema, options));
}

export function ZodQuery<T>(
  schema: z.ZodType<T>,
  options?: ZodValidationPipeOptions,
): ParameterDecorator {
  return Query(new ZodValidationPipe(schema, options));
}

export function ZodParam<T>(
  paramName: string,
  schema: z.ZodType<T>,
  options?: ZodValidationPipeOptions,
): ParameterDecorator {
  return Param(paramName, new ZodValidationPipe(schema, options));
}

/** A numeric id path parameter, `:id` unless named otherwise. */
export function ZodIdParam(paramName = "id"): ParameterDecorator {
  return ZodParam(paramName, serialIdSchema);
}
