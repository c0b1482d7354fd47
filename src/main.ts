#!/usr/bin/env node
import { realpathSync } from "node:fs";
import { resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { Command, InvalidArgumentError } from "commander";
import {
  AgentBrowserGateway,
  AgentLoop,
  build_system_prompt,
  negotiate_web_capability,
  run_shell_command,
  TaskLibrary,
  type RunStatus,
  type WebGateway,
} from "./agent/index.js";
import { create_progress_scope, ProgressIndicator } from "./channels/progress-indicator.js";
import { TerminalChannel } from "./channels/terminal.channel.js";
import { loadConfig, load_config_from_env, type RuntimeConfig } from "./config/index.js";
import { create_logger, set_log_level } from "./logger.js";
import { format_check_rows, run_system_check } from "./ops/system-check.js";
import { auto_select_model, OllamaProvider } from "./providers/index.js";
import { error_message, normalize_text, parse_positive_int } from "./utils/common.js";
import { load_env_files } from "./utils/env.js";

export type RunFlags = {
  model?: string;
  maxSteps?: number;
  saveTask?: boolean;
};

export const EXIT_CODES: Record<RunStatus, number> = {
  completed: 0,
  failed: 1,
  max_iterations_reached: 2,
};

function parse_steps(raw: string): number {
  const n = parse_positive_int(raw);
  if (n === null) throw new InvalidArgumentError("must be a positive integer");
  return n;
}

function load_runtime(flags: RunFlags = {}): RuntimeConfig {
  return loadConfig(load_config_from_env({ model: flags.model, maxIterations: flags.maxSteps }));
}

function create_provider(config: RuntimeConfig): OllamaProvider {
  return new OllamaProvider({
    ...config.provider,
    logger: create_logger("ollama"),
  });
}

function create_web_gateway(config: RuntimeConfig): WebGateway | null {
  const capability = negotiate_web_capability({ enabled: config.web.enabled });
  if (!capability.available || !capability.binary) return null;
  return new AgentBrowserGateway({
    binary: capability.binary,
    timeout_ms: config.web.timeout_ms,
    max_chars: config.web.max_chars,
  });
}

/** 목표 하나를 끝까지 실행하고 종료 코드를 반환. */
async function run_task(goal: string, flags: RunFlags): Promise<number> {
  const config = load_runtime(flags);
  const logger = create_logger("cli");
  const terminal = new TerminalChannel();
  const library = new TaskLibrary(config.dataDir);
  const provider = create_provider(config);
  const progress = create_progress_scope(new ProgressIndicator());

  if (!(await progress("Connecting", () => provider.is_running()))) {
    terminal.print(`  Ollama is not reachable at ${config.provider.api_base}. Start it with: ollama serve`);
    return EXIT_CODES.failed;
  }
  const model = config.provider.default_model || auto_select_model(await provider.list_models());
  if (!model) {
    terminal.print("  No models installed. Install one with: ollama pull llama3");
    return EXIT_CODES.failed;
  }

  const web = create_web_gateway(config);
  const endpoint = await progress("Connecting", () => provider.resolve_endpoint(model));
  logger.info("session", { model, endpoint, web: web !== null });
  terminal.render_header(model, goal, endpoint);

  const loop = new AgentLoop({
    provider,
    model,
    system_prompt: build_system_prompt({
      web_available: web !== null,
      custom_instructions: library.get_instructions(),
    }),
    ...config.loop,
    run_command: (command, on_line) => run_shell_command(command, { ...config.shell, on_line }),
    ask_user: () => terminal.ask(),
    web,
    progress,
    emit: terminal.handle_event,
    logger: logger.child("loop"),
  });
  const result = await loop.run(goal);

  if (result.status === "completed") {
    const save = flags.saveTask || (process.stdin.isTTY === true && await terminal.confirm("Save as a saved task?"));
    if (save) terminal.print(library.add_task(goal) ? "  Saved." : "  Already saved.");
  }
  return EXIT_CODES[result.status];
}

async function check_command(): Promise<number> {
  const config = load_runtime();
  const library = new TaskLibrary(config.dataDir);
  const rows = await run_system_check({
    api_base: config.provider.api_base,
    models: create_provider(config),
    web: negotiate_web_capability({ enabled: config.web.enabled }),
    read_instructions: () => library.get_instructions(),
  });
  const terminal = new TerminalChannel();
  for (const line of format_check_rows(rows)) terminal.print(line);
  return rows.every((r) => r.ok || r.label === "Web search/fetch") ? 0 : 1;
}

function tasks_command(): Command {
  const library = (): TaskLibrary => new TaskLibrary(load_runtime().dataDir);
  const terminal = new TerminalChannel();
  return new Command("tasks")
    .description("Manage saved tasks")
    .addCommand(new Command("list")
      .description("List saved tasks")
      .action(() => {
        const tasks = library().list_tasks();
        if (tasks.length === 0) terminal.print("  (no saved tasks)");
        for (const t of tasks) terminal.print(`  ${t.id}. ${t.goal}`);
      }))
    .addCommand(new Command("add")
      .description("Save a task")
      .argument("<goal...>", "Task text")
      .action((goal: string[]) => {
        terminal.print(library().add_task(goal.join(" ")) ? "  Saved." : "  Already saved or empty.");
      }))
    .addCommand(new Command("remove")
      .description("Remove a saved task")
      .argument("<id>", "Task id", parse_steps)
      .action((id: number) => {
        if (library().remove_task(id)) {
          terminal.print(`  Removed ${id}.`);
        } else {
          terminal.print(`  No saved task ${id}.`);
          process.exitCode = 1;
        }
      }))
    .addCommand(new Command("run")
      .description("Run a saved task")
      .argument("<id>", "Task id", parse_steps)
      .option("-m, --model <name>", "Model to use")
      .option("--max-steps <n>", "Maximum steps", parse_steps)
      .action(async (id: number, flags: RunFlags) => {
        const task = library().get_task(id);
        if (!task) {
          terminal.print(`  No saved task ${id}.`);
          process.exitCode = 1;
          return;
        }
        process.exitCode = await run_task(task.goal, flags);
      }));
}

function instructions_command(): Command {
  const library = (): TaskLibrary => new TaskLibrary(load_runtime().dataDir);
  const terminal = new TerminalChannel();
  return new Command("instructions")
    .description("Custom instructions appended to the system prompt")
    .addCommand(new Command("show")
      .description("Print the current instructions")
      .action(() => {
        terminal.print(library().get_instructions() || "  (no custom instructions)");
      }))
    .addCommand(new Command("set")
      .description("Replace the instructions")
      .argument("<text...>", "Instruction text")
      .action((text: string[]) => {
        library().set_instructions(text.join(" "));
        terminal.print("  Instructions saved.");
      }))
    .addCommand(new Command("clear")
      .description("Remove the instructions")
      .action(() => {
        library().clear_instructions();
        terminal.print("  Instructions cleared.");
      }));
}

/** 기본 명령. 하위 명령 이름으로 시작하는 목표는 `run` 뒤에 적는다. */
export type RunGoal = (goal: string, flags: RunFlags) => Promise<number>;

function run_command(program: Command, run_goal: RunGoal): Command {
  return new Command("run")
    .description("Run a task (default command)")
    .argument("[task...]", "Task to run")
    .option("-m, --model <name>", "Model to use (default: auto-select)")
    .option("--max-steps <n>", "Maximum steps", parse_steps)
    .option("--save-task", "Save the task after it completes")
    .action(async (task: string[], flags: RunFlags) => {
      let goal = normalize_text(task.join(" "));
      if (!goal && process.stdin.isTTY) {
        goal = normalize_text(await new TerminalChannel().prompt_line("  Task: "));
      }
      if (!goal) {
        program.error("no task given");
      }
      process.exitCode = await run_goal(goal, flags);
    });
}

export function build_program(run_goal: RunGoal = run_task): Command {
  const program = new Command();
  program
    .name("shell-agent")
    .description("Run a goal through a local model that drives the shell one command at a time")
    .version("0.1.0")
    .option("-v, --verbose", "Debug logging to stderr")
    .hook("preAction", (cmd) => {
      if (cmd.opts<{ verbose?: boolean }>().verbose) set_log_level("debug");
    })
    .addHelpText("after", [
      "",
      "A task that starts with a command name goes after `run`:",
      "  $ shell-agent run check disk usage on /var",
    ].join("\n"));

  program.addCommand(run_command(program, run_goal), { isDefault: true });
  program.addCommand(new Command("check")
    .description("Check Node.js, the Ollama service, models and web support")
    .allowExcessArguments(false)
    .action(async () => {
      process.exitCode = await check_command();
    }));
  program.addCommand(tasks_command());
  program.addCommand(instructions_command());
  return program;
}

function is_main_entry(): boolean {
  const argv1 = process.argv[1];
  if (!argv1) return false;
  try {
    const entry = realpathSync(resolve(argv1)).toLowerCase();
    const current = realpathSync(fileURLToPath(import.meta.url)).toLowerCase();
    return entry === current;
  } catch {
    return false;
  }
}

if (is_main_entry()) {
  const envLoad = load_env_files(process.cwd());
  if (envLoad.loaded > 0) {
    create_logger("boot").info(`loaded env vars=${envLoad.loaded} files=${envLoad.files.join(",")}`);
  }
  build_program().parseAsync(process.argv).catch((error: unknown) => {
    create_logger("boot").error(`failed: ${error_message(error)}`);
    process.exit(1);
  });
}
