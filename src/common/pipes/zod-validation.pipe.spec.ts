import { describe, expect, it } from "vitest";
import { z } from "zod";
import {
  mapZodIssuesToFieldErrors,
  ValidationFailedException,
  ZodValidationPipe,
} from "./zod-validation.pipe";

describe("ZodValidationPipe", () => {
  const schema = z.object({
    carId: z.coerce.number().int().positive(),
    notes: z.string().max(5).optional(),
  });

  it("returns parsed data with coercion applied", () => {
    const pipe = new ZodValidationPipe(schema);

    expect(pipe.transform({ carId: "12" })).toEqual({ carId: 12 });
  });

  it("throws a validation problem listing each failing field", () => {
    const pipe = new ZodValidationPipe(schema);

    let caught: unknown;
    try {
      pipe.transform({ carId: "0", notes: "too long" });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ValidationFailedException);
    if (!(caught instanceof ValidationFailedException)) return;
    expect(caught.getStatus()).toBe(400);
    expect(caught.errors?.map((error) => [error.field, error.code])).toEqual([
      ["carId", "too_small"],
      ["notes", "too_big"],
    ]);
  });

  it("uses custom exception factory when provided", () => {
    const pipe = new ZodValidationPipe(schema, {
      exceptionFactory: (errors) => new Error(`custom:${errors.length}`),
    });

    expect(() => pipe.transform({ carId: "x" })).toThrow("custom:1");
  });

  it("maps root-level issues to the _root field", () => {
    expect(
      mapZodIssuesToFieldErrors([{ path: [], code: "custom", message: "Payload is invalid" }]),
    ).toEqual([{ field: "_root", code: "custom", message: "Payload is invalid" }]);
  });

  it("joins nested paths with dots", () => {
    expect(
      mapZodIssuesToFieldErrors([{ path: ["ids", 2], code: "invalid_type", message: "Expected number" }]),
    ).toEqual([{ field: "ids.2", code: "invalid_type", message: "Expected number" }]);
  });
});
