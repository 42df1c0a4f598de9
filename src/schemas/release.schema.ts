import { z } from "zod";

/** Subset of the GitHub "latest release" payload that fleetfw reads */
export const RegistryAssetSchema = z.object({
  name: z.string(),
  browser_download_url: z.string(),
  size: z.number().int().nonnegative().optional(),
});

export const RegistryReleaseSchema = z.object({
  tag_name: z.string().min(1),
  name: z.string().nullish(),
  body: z.string().nullish(),
  html_url: z.string().nullish(),
  published_at: z.string().nullish(),
  assets: z.array(RegistryAssetSchema).default([]),
});

export type RegistryRelease = z.infer<typeof RegistryReleaseSchema>;

export interface ReleaseAsset {
  name: string;
  downloadUrl: string;
  size?: number;
}

export interface ReleaseMetadata {
  component: string;
  /** tag with any leading "v" removed */
  version: string;
  tag: string;
  releaseDate: string;
  notes: string;
  url: string;
  assets: ReleaseAsset[];
}
