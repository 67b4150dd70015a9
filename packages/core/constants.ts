/**
 * Shared constants for repository registration across packages.
 */

/** Marker inside a working directory that identifies a git repository (directory or file) */
export const GIT_MARKER = ".git"

/** gitfleet directory inside the user's config root */
export const CONFIG_DIRNAME = "gitfleet"

/** Registered repositories, one `path,name` line each */
export const REPO_PATH_FILENAME = "repo_path"

/** User command aliases, merged over the bundled defaults */
export const COMMANDS_FILENAME = "commands.toml"

/** User display settings for the status listing */
export const INFO_FILENAME = "info.toml"

/** Field separator of the repo_path store; never escaped */
export const STORE_FIELD_SEPARATOR = ","
