export type SeedStepName = "schema" | "catalog" | "accounts";

export interface SeedStepResult {
  step: SeedStepName;
  ok: boolean;
  error?: string;
}
