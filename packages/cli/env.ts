export const GITFLEET_GIT = process.env.GITFLEET_GIT ?? "git"

export const GITFLEET_REPO_PATH_FILE = process.env.GITFLEET_REPO_PATH_FILE?.trim() || undefined

export const XDG_CONFIG_HOME = process.env.XDG_CONFIG_HOME
