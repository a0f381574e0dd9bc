// pattern: Functional Core
import type { DeviceProfile, SourceConfig, SourcesConfig } from "./schema";

export type SourceEntry = Readonly<{
  id: string;
  source: SourceConfig;
}>;

function entries(
  config: SourcesConfig,
  predicate: (source: SourceConfig) => boolean,
): ReadonlyArray<SourceEntry> {
  return Object.entries(config.sources)
    .filter(([, source]) => predicate(source))
    .map(([id, source]) => ({ id, source }));
}

export function getSource(
  config: SourcesConfig,
  sourceId: string,
): SourceConfig | null {
  return Object.hasOwn(config.sources, sourceId)
    ? (config.sources[sourceId] ?? null)
    : null;
}

export function getEnabledSources(
  config: SourcesConfig,
): ReadonlyArray<SourceEntry> {
  return entries(config, (s) => s.enabled);
}

export function getScheduledSources(
  config: SourcesConfig,
): ReadonlyArray<SourceEntry> {
  return entries(config, (s) => s.enabled && s.mode === "scheduled");
}

export function getOnDemandSources(
  config: SourcesConfig,
): ReadonlyArray<SourceEntry> {
  return entries(config, (s) => s.enabled && s.mode === "on_demand");
}

/**
 * The profile named by `pipeline.deviceProfile`, when the source defines one.
 */
export function resolveDeviceProfile(
  config: SourcesConfig,
  source: SourceConfig,
): DeviceProfile | null {
  return source.deviceProfiles[config.pipeline.deviceProfile] ?? null;
}
