import { parse as parseYaml } from "yaml";
import { z } from "zod";

/**
 * Schema for plugin reckless.yaml / reckless.yml files.
 *
 * Only the shape of the `plugin` block is checked; unknown keys are kept
 * for downstream installers and builders.
 */

const pluginSectionSchema = z
  .object({
    name: z.string().optional(),
    version: z.string().optional(),
    lang: z.string().optional(),
    install: z.string().optional(),
    main: z.string().optional(),
  })
  .passthrough();

export const pluginConfigSchema = z
  .object({
    plugin: pluginSectionSchema.optional(),
  })
  .passthrough();

export type PluginConfig = z.infer<typeof pluginConfigSchema>;

/** Turns configuration text into a value, throwing when it is malformed. */
export type ConfigParser = (text: string) => PluginConfig;

/**
 * Default parser: YAML, then the permissive schema above. Scalars and
 * empty documents are rejected since they cannot hold a `plugin` block.
 */
export const parsePluginConfig: ConfigParser = (text) => {
  const parsed: unknown = parseYaml(text);
  if (parsed === null || typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new Error("configuration must be a YAML mapping");
  }
  const result = pluginConfigSchema.safeParse(parsed);
  if (!result.success) {
    throw new Error(result.error.issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`).join("; "));
  }
  return result.data;
};
