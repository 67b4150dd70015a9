import { Command } from "commander"
import { consola } from "consola"
import { addCommand } from "@/commands/add"
import { aliasCommand, type DispatchContext, superCommand } from "@/commands/dispatch"
import { infoCommand } from "@/commands/info"
import { llCommand } from "@/commands/ll"
import { lsCommand } from "@/commands/ls"
import { renameCommand } from "@/commands/rename"
import { rmCommand } from "@/commands/rm"
import { CommandResult, printOutcome } from "@/commands/types"
import { concurrencyDenylist, loadCommandAliases } from "@/config/commands"
import { resolveFleetPaths, storeLocationHelp } from "@/config/paths"
import { GITFLEET_REPO_PATH_FILE, XDG_CONFIG_HOME } from "@/env"
import { Registry } from "@/registry/registry"
import pkg from "./package.json" with { type: "json" }

async function main(): Promise<void> {
	const paths = resolveFleetPaths({
		repoPathFile: GITFLEET_REPO_PATH_FILE,
		xdgConfigHome: XDG_CONFIG_HOME,
	})

	const registry = new Registry(paths.repoPathFile)
	const loaded = await registry.load()
	if (!loaded.ok) {
		printOutcome(CommandResult.failed(loaded.error))
		return
	}
	for (const warning of loaded.value.warnings) {
		consola.warn(warning)
	}

	const aliases = await loadCommandAliases({
		defaults: paths.defaultCommandsFile,
		user: paths.userCommandsFile,
	})
	if (!aliases.ok) {
		printOutcome(CommandResult.failed(aliases.error))
		return
	}

	const dispatchContext: DispatchContext = {
		denylist: concurrencyDenylist(aliases.value),
		registry,
	}

	const program = new Command()

	program
		.name("gitfleet")
		.description(
			"Manage many git repos as one fleet: show their status side by side and run git commands across them.",
		)
		.version(pkg.version, "-V, --version", "Output the version number")
		.enablePositionalOptions()
		.showHelpAfterError()
		.showSuggestionAfterError()

	program
		.command("add")
		.description("Register repo(s)")
		.argument("<paths...>", "Repo directories")
		.addHelpText("after", storeLocationHelp(paths))
		.action(async (repoPaths: string[]) => {
			await addCommand(registry, repoPaths)
		})

	program
		.command("rm")
		.description("Unregister repo(s)")
		.argument("<repos...>", "Repo names")
		.action(async (names: string[]) => {
			await rmCommand(registry, names)
		})

	program
		.command("rename")
		.description("Rename a repo")
		.argument("<repo>", "Current repo name")
		.argument("<new-name>", "New repo name")
		.action(async (repo: string, newName: string) => {
			await renameCommand(registry, repo, newName)
		})

	program
		.command("ls")
		.description("Show the names of all repos, or the path of one")
		.argument("[repo]", "Repo name")
		.addHelpText("after", storeLocationHelp(paths))
		.action(async (repo: string | undefined) => {
			await lsCommand(registry, repo)
		})

	program
		.command("ll")
		.description(
			[
				"Show a status summary of all repos",
				"",
				"Local changes: + staged, * unstaged, _ untracked",
				"Branch colour: white no upstream, green in sync, purple ahead,",
				"               yellow behind, red diverged",
			].join("\n"),
		)
		.action(async () => {
			await llCommand(registry, paths.infoFile)
		})

	program
		.command("info")
		.description("Show which status items `ll` displays")
		.action(async () => {
			await infoCommand(paths.infoFile)
		})

	program
		.command("super")
		.description(
			"Run any git command in the chosen repos, or all repos\n" +
				"Example: gitfleet super myrepo1 myrepo2 checkout -b feature",
		)
		.argument("<words...>", "Optional repo names followed by the git command")
		.passThroughOptions()
		.allowUnknownOption()
		.action(async (words: string[]) => {
			await superCommand(dispatchContext, words)
		})

	for (const alias of aliases.value.values()) {
		const scope = alias.allowAll ? "for all repos or the chosen repo(s)" : "for the chosen repo(s)"
		program
			.command(alias.name)
			.description(`${alias.help} ${scope}`)
			.argument(alias.allowAll ? "[repos...]" : "<repos...>", "Repo names")
			.action(async (names: string[]) => {
				await aliasCommand(dispatchContext, alias, names)
			})
	}

	if (process.argv.length <= 2) {
		program.outputHelp()
		return
	}

	await program.parseAsync(process.argv)
}

main().catch((error) => {
	consola.error(error instanceof Error ? error.message : error)
	process.exit(1)
})
