import type { AbsolutePath, RepoName, Result } from "@gitfleet/core"
import { CommandResult, printOutcome } from "@/commands/types"
import type { CommandAlias } from "@/config/commands"
import { Dispatcher } from "@/dispatch/dispatcher"
import { createConsoleOutput } from "@/dispatch/output"
import { createProcessRunner } from "@/dispatch/runner"
import type { DispatchPlan, DispatchSummary } from "@/dispatch/types"
import { listRepos, type Registry, selectRepos } from "@/registry/registry"
import type { NotFoundError } from "@/types/errors"
import { ensureGitAvailable } from "@/utils/git"

export interface DispatchContext {
	registry: Registry
	/** Verbs that must run one repo at a time. */
	denylist: ReadonlySet<string>
	dispatcher?: Dispatcher
}

export async function aliasCommand(
	context: DispatchContext,
	alias: CommandAlias,
	names: string[],
): Promise<void> {
	const git = ensureGitAvailable()
	if (!git.ok) {
		printOutcome(CommandResult.failed(git.error))
		return
	}

	printOutcome(
		await dispatchCommand(context, names, alias.argv, { serialOnly: alias.disableAsync }),
	)
}

export async function superCommand(context: DispatchContext, words: string[]): Promise<void> {
	const git = ensureGitAvailable()
	if (!git.ok) {
		printOutcome(CommandResult.failed(git.error))
		return
	}

	printOutcome(await superDispatch(context, words))
}

/**
 * `super` takes leading words that name registered repos as targets; everything from
 * the first other word on is the git command.
 */
export async function superDispatch(
	context: DispatchContext,
	words: readonly string[],
): Promise<CommandResult<DispatchSummary>> {
	const loaded = await context.registry.load()
	if (!loaded.ok) {
		return CommandResult.failed(loaded.error)
	}

	const { argv, names } = splitSuperArgs(words, loaded.value.repos)
	if (argv.length === 0) {
		return CommandResult.failed({
			field: "command",
			message: "No git command given. Example: gitfleet super myrepo checkout main",
			source: "manual",
			type: "validation",
		})
	}

	return dispatchCommand(context, names, argv)
}

export function splitSuperArgs(
	words: readonly string[],
	repos: ReadonlyMap<RepoName, AbsolutePath>,
): { names: string[]; argv: string[] } {
	const known = new Set<string>(repos.keys())
	let split = 0
	while (split < words.length && known.has(words[split] ?? "")) {
		split += 1
	}
	return { argv: words.slice(split), names: words.slice(0, split) }
}

export async function dispatchCommand(
	context: DispatchContext,
	names: readonly string[],
	argv: readonly string[],
	options: { serialOnly?: boolean } = {},
): Promise<CommandResult<DispatchSummary>> {
	const loaded = await context.registry.load()
	if (!loaded.ok) {
		return CommandResult.failed(loaded.error)
	}

	const plan = buildDispatchPlan(loaded.value.repos, names, argv, context.denylist)
	if (!plan.ok) {
		return CommandResult.failed(plan.error)
	}

	const dispatcher =
		context.dispatcher ?? new Dispatcher(createProcessRunner(), createConsoleOutput())
	const summary = await dispatcher.run(
		options.serialOnly ? { ...plan.value, allowConcurrent: false } : plan.value,
	)
	if (!summary.ok) {
		return CommandResult.failed(summary.error)
	}
	return CommandResult.completed(summary.value)
}

/**
 * Targets are the named repos, or every repo when none is named. Concurrency is off
 * when the verb is on the denylist.
 */
export function buildDispatchPlan(
	repos: ReadonlyMap<RepoName, AbsolutePath>,
	names: readonly string[],
	argv: readonly string[],
	denylist: ReadonlySet<string>,
): Result<DispatchPlan, NotFoundError> {
	let targets = listRepos(repos)
	if (names.length > 0) {
		const selected = selectRepos(repos, names)
		if (!selected.ok) {
			return selected
		}
		targets = selected.value
	}

	const verb = argv[0]
	return {
		ok: true,
		value: {
			allowConcurrent: verb === undefined || !denylist.has(verb),
			argv,
			targets,
		},
	}
}
