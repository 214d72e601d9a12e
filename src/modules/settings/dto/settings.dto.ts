import { z } from "zod";

export const testEmailSchema = z.object({
  testEmail: z.email("Please provide a valid email address to test."),
});

export type TestEmailDto = z.infer<typeof testEmailSchema>;
