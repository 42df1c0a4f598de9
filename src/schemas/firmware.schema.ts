import { z } from "zod";

export const FirmwareStatusSchema = z.enum(["current", "available", "deprecated", "pending"]);
export const UpdateStatusSchema = z.enum(["success", "failed"]);

export const FirmwareRecordSchema = z.object({
  device: z.string().min(1),
  component: z.string().min(1),
  version: z.string().min(1),
  releaseDate: z.string(),
  /** hex SHA-256 of the installed payload; empty when never installed by fleetfw */
  checksum: z.string(),
  status: FirmwareStatusSchema,
  downloadUrl: z.string().default(""),
  notes: z.string().default(""),
  createdAt: z.string(),
});

export const UpdateLogEntrySchema = z.object({
  id: z.number().int().positive(),
  device: z.string(),
  component: z.string(),
  fromVersion: z.string(),
  toVersion: z.string(),
  status: UpdateStatusSchema,
  appliedAt: z.string(),
  error: z.string().default(""),
});

export const InstallManifestSchema = z.object({
  version: z.string(),
  checksum: z.string(),
  verified: z.boolean(),
  installedAt: z.string(),
  /** path relative to the target -> SHA-256 */
  files: z.record(z.string()),
});

export type FirmwareStatus = z.infer<typeof FirmwareStatusSchema>;
export type UpdateStatus = z.infer<typeof UpdateStatusSchema>;
export type FirmwareRecord = z.infer<typeof FirmwareRecordSchema>;
export type UpdateLogEntry = z.infer<typeof UpdateLogEntrySchema>;
export type NewUpdateLogEntry = Omit<UpdateLogEntry, "id">;
export type InstallManifest = z.infer<typeof InstallManifestSchema>;
