import os from "node:os"
import path from "node:path"
import { fileURLToPath } from "node:url"
import {
	type AbsolutePath,
	assertAbsolutePathDirect,
	COMMANDS_FILENAME,
	CONFIG_DIRNAME,
	INFO_FILENAME,
	REPO_PATH_FILENAME,
} from "@gitfleet/core"

export interface FleetPaths {
	repoPathFile: AbsolutePath
	userCommandsFile: AbsolutePath
	infoFile: AbsolutePath
	defaultCommandsFile: AbsolutePath
}

export interface FleetPathOptions {
	xdgConfigHome?: string
	homeDir?: string
	repoPathFile?: string
}

export const DEFAULT_COMMANDS_FILE = assertAbsolutePathDirect(
	fileURLToPath(new URL("./commands.toml", import.meta.url)),
)

export function resolveConfigRoot(options: FleetPathOptions = {}): AbsolutePath {
	const xdg = options.xdgConfigHome?.trim()
	const root = xdg ? xdg : path.join(options.homeDir ?? os.homedir(), ".config")
	return assertAbsolutePathDirect(path.resolve(root))
}

export function resolveFleetPaths(options: FleetPathOptions = {}): FleetPaths {
	const configDir = assertAbsolutePathDirect(
		path.join(resolveConfigRoot(options), CONFIG_DIRNAME),
	)
	const repoPathFile = options.repoPathFile
		? assertAbsolutePathDirect(path.resolve(options.repoPathFile))
		: assertAbsolutePathDirect(path.join(configDir, REPO_PATH_FILENAME))

	return {
		defaultCommandsFile: DEFAULT_COMMANDS_FILE,
		infoFile: assertAbsolutePathDirect(path.join(configDir, INFO_FILENAME)),
		repoPathFile,
		userCommandsFile: assertAbsolutePathDirect(path.join(configDir, COMMANDS_FILENAME)),
	}
}

/**
 * Help text for commands that read or write the store. Stores kept under another
 * tool's config directory are not picked up on their own.
 */
export function storeLocationHelp(paths: Pick<FleetPaths, "repoPathFile">): string {
	return [
		"",
		`Repos are recorded in ${paths.repoPathFile}.`,
		"To reuse an existing path,name store, set GITFLEET_REPO_PATH_FILE to its location.",
	].join("\n")
}
