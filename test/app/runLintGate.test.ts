import * as path from "node:path";

import { Effect, Exit } from "effect";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import {
	type LintGateHost,
	runLintGate,
} from "../../src/app/runLintGate.js";
import { ToolExecError } from "../../src/core/errors.js";
import type { ProcessOutcome } from "../../src/core/models.js";
import {
	type ProcessOptions,
	type ProcessRunner,
	spawnProcessRunner,
} from "../../src/shell/process/runner.js";
import {
	createTempProject,
	exitScript,
	type TempProject,
} from "../utils/tempProject.js";

interface RecordedCall {
	readonly command: string;
	readonly args: readonly string[];
	readonly options: ProcessOptions;
}

/**
 * In-process stand-in for the lint tool: records calls and replays outcomes.
 */
function fakeRunner(...outcomes: ProcessOutcome[]): {
	readonly runner: ProcessRunner;
	readonly calls: RecordedCall[];
} {
	const calls: RecordedCall[] = [];
	const runner: ProcessRunner = {
		run: (command, args, options) =>
			Effect.sync(() => {
				calls.push({ command, args, options });
				return outcomes[Math.min(calls.length, outcomes.length) - 1] ?? {
					code: 0,
					signal: null,
				};
			}),
	};
	return { runner, calls };
}

const exited = (code: number): ProcessOutcome => ({ code, signal: null });

let project: TempProject | undefined;
let stderr: string[] = [];

beforeEach((): void => {
	stderr = [];
	vi.spyOn(console, "error").mockImplementation((...args: unknown[]) => {
		stderr.push(args.map(String).join(" "));
	});
});

afterEach((): void => {
	project?.cleanup();
	project = undefined;
});

const hostFor = (t: TempProject, runner: ProcessRunner): LintGateHost => ({
	cwd: t.root,
	env: { PATH: "", HOME: "/home/dev" },
	platform: "linux",
	runner,
	signals: { SIGTERM: 15, SIGKILL: 9 },
});

const builtProject = (): TempProject =>
	createTempProject({ withEnv: true, tools: { flake8: exitScript(0) } });

describe("runLintGate: pass-through of the tool's status", () => {
	it("exits 0 when the tool reports no findings", async () => {
		project = builtProject();
		const { runner } = fakeRunner(exited(0));

		const code = await Effect.runPromise(runLintGate(hostFor(project, runner)));

		expect(code).toBe(0);
		expect(stderr).toEqual([]);
	});

	it("exits with the tool's own non-zero status and adds no message", async () => {
		project = builtProject();
		const { runner } = fakeRunner(exited(1));

		const code = await Effect.runPromise(runLintGate(hostFor(project, runner)));

		expect(code).toBe(1);
		expect(stderr).toEqual([]);
	});

	it("keeps statuses other than 1 unchanged", async () => {
		project = builtProject();
		const { runner } = fakeRunner(exited(2));

		const code = await Effect.runPromise(runLintGate(hostFor(project, runner)));

		expect(code).toBe(2);
	});

	it("maps signal termination to 128 + signal number", async () => {
		project = builtProject();
		const { runner } = fakeRunner({ code: null, signal: "SIGTERM" });

		const code = await Effect.runPromise(runLintGate(hostFor(project, runner)));

		expect(code).toBe(143);
	});

	it("returns the same code for two runs on an unchanged tree", async () => {
		project = builtProject();
		const { runner, calls } = fakeRunner(exited(1), exited(1));
		const host = hostFor(project, runner);

		const first = await Effect.runPromise(runLintGate(host));
		const second = await Effect.runPromise(runLintGate(host));

		expect([first, second]).toEqual([1, 1]);
		expect(calls).toHaveLength(2);
	});
});

describe("runLintGate: invocation", () => {
	it("runs the resolved tool over the whole tree inside the activated environment", async () => {
		project = builtProject();
		const { runner, calls } = fakeRunner(exited(0));

		await Effect.runPromise(runLintGate(hostFor(project, runner)));

		expect(calls).toEqual([
			{
				command: path.join(project.binDir, "flake8"),
				args: ["."],
				options: {
					cwd: project.projectDir,
					env: {
						PATH: project.binDir,
						HOME: "/home/dev",
						VIRTUAL_ENV: project.envDir,
					},
				},
			},
		]);
	});

	it("leaves process.cwd() and process.env unchanged", async () => {
		project = builtProject();
		const { runner } = fakeRunner(exited(0));
		const cwdBefore = process.cwd();
		const virtualEnvBefore = process.env["VIRTUAL_ENV"];

		await Effect.runPromise(runLintGate(hostFor(project, runner)));

		expect(process.cwd()).toBe(cwdBefore);
		expect(process.env["VIRTUAL_ENV"]).toBe(virtualEnvBefore);
	});

	it("uses an explicit config without reading lint-gate.config.json", async () => {
		project = createTempProject({
			withEnv: true,
			tools: { ruff: exitScript(0) },
			config: "{ broken",
		});
		const { runner, calls } = fakeRunner(exited(0));

		const code = await Effect.runPromise(
			runLintGate(hostFor(project, runner), {
				projectDir: project.projectDir,
				envDir: project.envDir,
				tool: "ruff",
				args: ["check", "."],
				verbose: false,
			}),
		);

		expect(code).toBe(0);
		expect(calls[0]?.command).toBe(path.join(project.binDir, "ruff"));
		expect(calls[0]?.args).toEqual(["check", "."]);
	});

	it("prints progress on stderr in verbose mode", async () => {
		project = createTempProject({
			withEnv: true,
			tools: { flake8: exitScript(0) },
			config: '{"verbose": true}',
		});
		const { runner } = fakeRunner(exited(1));

		await Effect.runPromise(runLintGate(hostFor(project, runner)));

		expect(stderr).toEqual([
			`🔍 Linting directory: ${project.projectDir}`,
			`   Environment: ${project.envDir}`,
			`   Running: ${path.join(project.binDir, "flake8")} .`,
			"❌ Lint tool exited with status 1",
		]);
	});
});

describe("runLintGate: preparation failures", () => {
	it("exits non-zero without invoking the tool when the directory is missing", async () => {
		project = createTempProject({ withProjectDir: false });
		const { runner, calls } = fakeRunner(exited(0));

		const code = await Effect.runPromise(runLintGate(hostFor(project, runner)));

		expect(code).toBe(1);
		expect(calls).toHaveLength(0);
		expect(stderr[1]).toBe(
			`  • Project directory ${project.projectDir} does not exist.`,
		);
	});

	it("exits non-zero without invoking the tool when the environment cannot be activated", async () => {
		project = createTempProject();
		const { runner, calls } = fakeRunner(exited(0));

		const code = await Effect.runPromise(runLintGate(hostFor(project, runner)));

		expect(code).toBe(1);
		expect(calls).toHaveLength(0);
		expect(stderr[1]).toBe(
			`  • Isolated environment ${project.envDir} was not found.`,
		);
	});

	it("exits 127 without invoking anything when the tool is not installed", async () => {
		project = createTempProject({ withEnv: true });
		const { runner, calls } = fakeRunner(exited(0));

		const code = await Effect.runPromise(runLintGate(hostFor(project, runner)));

		expect(code).toBe(127);
		expect(calls).toHaveLength(0);
	});

	it("exits 2 on an invalid configuration file", async () => {
		project = createTempProject({ withEnv: true, config: '{"args": "."}' });
		const { runner, calls } = fakeRunner(exited(0));

		const code = await Effect.runPromise(runLintGate(hostFor(project, runner)));

		expect(code).toBe(2);
		expect(calls).toHaveLength(0);
	});

	it("exits 126 when the tool cannot be started", async () => {
		project = builtProject();
		const runner: ProcessRunner = {
			run: (command) =>
				Effect.fail(new ToolExecError({ command, detail: "spawn EACCES" })),
		};

		const code = await Effect.runPromise(runLintGate(hostFor(project, runner)));

		expect(code).toBe(126);
		expect(stderr[1]).toBe(
			`  • Lint tool ${path.join(project.binDir, "flake8")} could not be started: spawn EACCES.`,
		);
	});

	it("exits 2 when a configured argument contains a NUL character", async () => {
		project = createTempProject({
			withEnv: true,
			tools: { flake8: exitScript(0) },
			config: JSON.stringify({ args: ["a\u0000b"] }),
		});
		const { runner, calls } = fakeRunner(exited(0));

		const code = await Effect.runPromise(runLintGate(hostFor(project, runner)));

		expect(code).toBe(2);
		expect(calls).toHaveLength(0);
	});

	it.skipIf(process.platform === "win32")(
		"exits 126 instead of dying when spawn rejects an argument",
		async () => {
			project = builtProject();

			const exit = await Effect.runPromiseExit(
				runLintGate(hostFor(project, spawnProcessRunner), {
					projectDir: project.projectDir,
					envDir: project.envDir,
					tool: "flake8",
					args: ["a\u0000b"],
					verbose: false,
				}),
			);

			expect(Exit.isSuccess(exit)).toBe(true);
			if (Exit.isSuccess(exit)) expect(exit.value).toBe(126);
			expect(stderr[1]).toContain(
				`  • Lint tool ${path.join(project.binDir, "flake8")} could not be started: `,
			);
		},
	);
});
