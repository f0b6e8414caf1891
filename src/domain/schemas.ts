import { z } from 'zod';

export const envSnapshotSchema = z.record(z.string(), z.string());

export const validateSettingsInput = z.object({
  env: envSnapshotSchema,
  useCache: z.boolean().optional(),
});

export const runScenariosInput = z.object({
  ids: z.array(z.string().min(1)).optional(),
  base: envSnapshotSchema.optional(),
});

export const adHocScenarioInput = z.object({
  name: z.string().min(1, 'Scenario name is required'),
  env: envSnapshotSchema,
  base: envSnapshotSchema.optional(),
});

export type ValidateSettingsInput = z.infer<typeof validateSettingsInput>;
export type RunScenariosInput = z.infer<typeof runScenariosInput>;
export type AdHocScenarioInput = z.infer<typeof adHocScenarioInput>;
