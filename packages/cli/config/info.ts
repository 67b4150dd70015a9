import type { AbsolutePath, Result } from "@gitfleet/core"
import { z } from "zod"
import { type ConfigError, readTomlConfig } from "@/config/toml"
import { DEFAULT_PROBE_IDS, PROBE_IDS, type ProbeId } from "@/status/probes"

const infoSchema = z
	.object({
		items: z
			.array(z.enum(PROBE_IDS))
			.refine((items) => new Set(items).size === items.length, {
				message: "items must not repeat.",
			}),
	})
	.strict()

/**
 * Probe ids shown by `ll`, in order. Falls back to the defaults when the file is missing.
 */
export async function loadInfoItems(
	infoFile: AbsolutePath,
): Promise<Result<ProbeId[], ConfigError>> {
	const settings = await readTomlConfig(infoFile, infoSchema, "info")
	if (!settings.ok) {
		return settings
	}
	return { ok: true, value: settings.value ? settings.value.items : [...DEFAULT_PROBE_IDS] }
}
