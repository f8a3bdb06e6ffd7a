import { promises as fs } from "node:fs";
import path from "node:path";

import dotenv from "dotenv";

import type { AuditEntry } from "./audit.js";
import { loadConfig, type EnvMap, type RegistryConfig } from "./config.js";
import { runDoctor } from "./doctor.js";
import { describeError, isRegistryError } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";
import { validateMetadataInput } from "./metadata.js";
import { ModelRegistry } from "./registry.js";
import { RegistryServer } from "./server.js";
import { AuditFollower } from "./watcher.js";

type OutputMode = "text" | "json";

export interface CommandIO {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
  env: EnvMap;
  cwd: string;
  /** Resolves when a long-running command (`serve`, `audit --follow`) should stop. */
  untilStopped?: () => Promise<void>;
  /** Builds the registry; tests swap in one over an in-memory backend. */
  openRegistry?: (config: RegistryConfig, logger: Logger) => ModelRegistry;
}

class UsageError extends Error {}

const BOOLEAN_FLAGS = new Set(["verify", "follow", "deep", "aliases", "json"]);

interface ParsedArgs {
  positionals: string[];
  options: Map<string, string>;
  flags: Set<string>;
}

function parseArgs(argv: string[]): ParsedArgs {
  const positionals: string[] = [];
  const options = new Map<string, string>();
  const flags = new Set<string>();
  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (!arg.startsWith("--")) {
      positionals.push(arg);
      continue;
    }
    const body = arg.slice(2);
    const eq = body.indexOf("=");
    if (eq >= 0) {
      options.set(body.slice(0, eq), body.slice(eq + 1));
      continue;
    }
    if (BOOLEAN_FLAGS.has(body)) {
      flags.add(body);
      continue;
    }
    const value = argv[i + 1];
    if (value === undefined || value.startsWith("--")) throw new UsageError(`--${body} requires a value`);
    options.set(body, value);
    i += 1;
  }
  return { positionals, options, flags };
}

function parseOutputMode(args: ParsedArgs): OutputMode {
  if (args.flags.has("json")) return "json";
  const value = args.options.get("output") ?? "text";
  if (value !== "text" && value !== "json") throw new UsageError(`Unsupported output mode: ${value}`);
  return value;
}

function expectPositionals(args: ParsedArgs, names: string[]): string[] {
  if (args.positionals.length !== names.length) {
    throw new UsageError(`Expected ${names.map((name) => `<${name}>`).join(" ")}`);
  }
  return args.positionals;
}

function requireOption(args: ParsedArgs, name: string): string {
  const value = args.options.get(name);
  if (value === undefined || value.trim() === "") throw new UsageError(`--${name} is required`);
  return value;
}

export function usage(): string {
  return [
    "Usage: model-registry <command> [--root PATH] [--env-file PATH] [--output text|json]",
    "",
    "Commands:",
    "  register <task> <model> <version> --artifacts DIR --creator NAME",
    "           [--framework F] [--model-type T] [--code-ref R] [--dataset-ref R]",
    "           [--metadata-json FILE | --metadata JSON] [--set-alias ALIAS] [--actor A] [--reason R]",
    "  resolve  <task> <model[@alias|@version]> [--verify]",
    "  show     <task> <model[@alias|@version]> [--verify]",
    "  promote  <task> <model> <alias> <version> --actor A [--reason R]",
    "  verify   <task> <model[@alias|@version]>",
    "  audit    <task> <model> [--follow]",
    "  list     [task [model]] [--aliases]",
    "  health   Check that the registry root is reachable.",
    "  doctor   [--deep] Run environment and consistency checks.",
    "  serve    [--host HOST] [--port PORT] Start the HTTP API.",
  ].join("\n");
}

async function loadEnv(args: ParsedArgs, io: CommandIO): Promise<EnvMap> {
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(io.env)) {
    if (value !== undefined) env[key] = value;
  }
  const explicit = args.options.get("env-file");
  const file = path.resolve(io.cwd, explicit ?? ".env");
  try {
    await fs.access(file);
  } catch (error) {
    if (explicit !== undefined) throw new UsageError(`Env file not found: ${file}`, { cause: error });
    return env;
  }
  // values already in the environment win over the file
  const result = dotenv.config({ path: file, processEnv: env });
  if (result.error) throw new UsageError(`Cannot read env file ${file}: ${result.error.message}`);
  return env;
}

function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

async function readMetadataArgs(args: ParsedArgs, cwd: string): Promise<Record<string, unknown>> {
  let base: Record<string, unknown> = {};
  const file = args.options.get("metadata-json");
  const inline = args.options.get("metadata");
  if (file !== undefined && inline !== undefined) {
    throw new UsageError("Use either --metadata-json or --metadata, not both");
  }
  const source = file !== undefined ? await fs.readFile(path.resolve(cwd, file), "utf8") : inline;
  if (source !== undefined) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(source);
    } catch (error) {
      throw new UsageError(`Metadata is not valid JSON: ${describeError(error)}`);
    }
    if (!isJsonObject(parsed)) throw new UsageError("Metadata must be a JSON object");
    base = parsed;
  }

  const merged: Record<string, unknown> = { ...base };
  const fromFlags: [string, string][] = [
    ["creator", "creator"],
    ["framework", "framework"],
    ["model-type", "modelType"],
    ["code-ref", "codeRef"],
    ["dataset-ref", "datasetRef"],
  ];
  for (const [flag, field] of fromFlags) {
    const value = args.options.get(flag);
    if (value !== undefined) merged[field] = value;
  }
  return merged;
}

function formatAuditEntry(entry: AuditEntry): string {
  const reason = entry.reason ? ` (${entry.reason})` : "";
  return `${entry.ts} ${entry.actor} ${entry.action} ${entry.alias}: ${entry.from ?? "-"} -> ${entry.to}${reason}`;
}

function waitForSignal(): Promise<void> {
  return new Promise<void>((resolve) => {
    const stop = (): void => {
      process.off("SIGINT", stop);
      process.off("SIGTERM", stop);
      resolve();
    };
    process.on("SIGINT", stop);
    process.on("SIGTERM", stop);
  });
}

async function execute(command: string, args: ParsedArgs, output: OutputMode, io: CommandIO): Promise<number> {
  const print = (payload: Record<string, unknown>, text: string[]): void => {
    if (output === "json") {
      io.stdout(JSON.stringify({ status: "ok", command, ...payload }, null, 2));
    } else {
      for (const line of text) io.stdout(line);
    }
  };

  const env = await loadEnv(args, io);
  const config = loadConfig(env, { root: args.options.get("root") });
  const logger = createLogger("model-registry", {
    ...config.log,
    sink: { write: (line) => io.stderr(line.trimEnd()) },
  });
  const registry = io.openRegistry ? io.openRegistry(config, logger) : ModelRegistry.fromConfig(config, logger);

  switch (command) {
    case "register": {
      const [task, model, version] = expectPositionals(args, ["task", "model", "version"]);
      const metadata = validateMetadataInput(await readMetadataArgs(args, io.cwd));
      const result = await registry.register({
        task,
        model,
        version,
        artifacts: { dir: path.resolve(io.cwd, requireOption(args, "artifacts")) },
        metadata,
        alias: args.options.get("set-alias") ?? null,
        actor: args.options.get("actor"),
        reason: args.options.get("reason") ?? null,
      });
      const lines = [`Registered ${task}/${model}/${version} at ${result.path}`];
      if (result.promotion) lines.push(`Alias ${result.promotion.alias} -> ${result.promotion.new}`);
      print({ ...result }, lines);
      return 0;
    }

    case "resolve": {
      const [task, ref] = expectPositionals(args, ["task", "ref"]);
      const resolution = await registry.resolve(task, ref, { verify: args.flags.has("verify") });
      print({ ...resolution }, [resolution.path]);
      return 0;
    }

    case "show": {
      const [task, ref] = expectPositionals(args, ["task", "ref"]);
      const shown = await registry.show(task, ref, { verify: args.flags.has("verify") });
      print({ ...shown }, [
        `${shown.task}/${shown.model}/${shown.version}`,
        `path:      ${shown.path}`,
        `created:   ${shown.metadata.createdAt} by ${shown.metadata.creator}`,
        `aliases:   ${shown.aliases.length > 0 ? shown.aliases.join(", ") : "-"}`,
        `integrity: ${shown.manifestStatus}`,
        "files:",
        ...Object.entries(shown.manifest).map(([name, digest]) => `  ${digest}  ${name}`),
      ]);
      return 0;
    }

    case "promote": {
      const [task, model, alias, version] = expectPositionals(args, ["task", "model", "alias", "version"]);
      const result = await registry.promote({
        task,
        model,
        alias,
        version,
        actor: requireOption(args, "actor"),
        reason: args.options.get("reason") ?? null,
      });
      print({ ...result }, [`Alias ${alias}: ${result.previous ?? "-"} -> ${result.new}`]);
      return 0;
    }

    case "verify": {
      const [task, ref] = expectPositionals(args, ["task", "ref"]);
      const report = await registry.verify(task, ref);
      if (output === "json") {
        io.stdout(JSON.stringify({ status: report.ok ? "ok" : "error", command, ...report }, null, 2));
      } else if (report.ok) {
        io.stdout(`OK ${report.task}/${report.model}/${report.version}`);
      } else {
        io.stderr(`FAILED ${report.task}/${report.model}/${report.version}: ${String(report.mismatches.length)} mismatch(es)`);
        for (const mismatch of report.mismatches) io.stderr(`  ${mismatch.kind}: ${mismatch.file}`);
      }
      return report.ok ? 0 : 1;
    }

    case "audit": {
      const [task, model] = expectPositionals(args, ["task", "model"]);
      const entries = await registry.audit(task, model);
      print({ task, model, entries }, entries.map(formatAuditEntry));
      if (!args.flags.has("follow")) return 0;

      let failure: unknown = null;
      const follower = new AuditFollower(
        registry.backend,
        registry.auditLog,
        { task, model },
        {
          onEntry: (entry) => io.stdout(output === "json" ? JSON.stringify(entry) : formatAuditEntry(entry)),
          onError: (error) => {
            failure = error;
            logger.error("audit follow failed", { task, model, error: describeError(error) });
          },
        },
        { usePolling: config.backend === "shared" },
      );
      await follower.start();
      await (io.untilStopped ?? waitForSignal)();
      await follower.stop();
      return failure === null ? 0 : 1;
    }

    case "list": {
      const [task, model] = args.positionals;
      if (args.positionals.length > 2) throw new UsageError("list takes at most <task> <model>");
      if (args.positionals.length === 0) {
        const tasks = await registry.listTasks();
        print({ tasks }, tasks);
      } else if (args.positionals.length === 1) {
        const models = await registry.listModels(task);
        print({ task, models }, models);
      } else if (args.flags.has("aliases")) {
        const aliases = await registry.listAliases(task, model);
        print({ task, model, aliases }, aliases.map((entry) => `${entry.alias} -> ${entry.version}`));
      } else {
        const versions = await registry.listVersions(task, model);
        print({ task, model, versions }, versions);
      }
      return 0;
    }

    case "health": {
      const report = await registry.health();
      if (output === "json") {
        io.stdout(JSON.stringify({ status: report.ok ? "ok" : "error", command, ...report }, null, 2));
      } else if (report.ok) {
        io.stdout(`ok ${report.backend} ${report.root}`);
      } else {
        io.stderr(`unreachable ${report.backend} ${report.root}: ${report.error ?? "unknown"}`);
      }
      return report.ok ? 0 : 1;
    }

    case "doctor": {
      const report = await runDoctor(registry, { deep: args.flags.has("deep") });
      const failed = report.summary.required_failed > 0;
      if (output === "json") {
        io.stdout(JSON.stringify({ status: failed ? "error" : "ok", command, ...report }, null, 2));
      } else {
        for (const check of report.checks) {
          const marker = check.ok ? "ok" : check.level === "required" ? "FAIL" : "warn";
          io.stdout(`[${marker}] ${check.id}: ${check.message}`);
        }
        io.stdout(
          `required: ${String(report.summary.required_total - report.summary.required_failed)}/${String(report.summary.required_total)} passed`,
        );
      }
      return failed ? 1 : 0;
    }

    case "serve": {
      const port = args.options.has("port") ? Number(args.options.get("port")) : config.server.port;
      if (!Number.isInteger(port) || port < 0 || port > 65535) throw new UsageError("--port must be 0-65535");
      const host = args.options.get("host") ?? config.server.host;
      const server = new RegistryServer({
        registry,
        host,
        port,
        logger: logger.child("http"),
      });
      await server.start();
      io.stderr(`Serving ${config.backend} registry ${config.root} on http://${host}:${String(server.port)}`);
      await (io.untilStopped ?? waitForSignal)();
      await server.stop();
      return 0;
    }

    default:
      throw new UsageError(`Unknown command: ${command}`);
  }
}

/**
 * Run one CLI invocation. Exit codes: 0 success, 1 registry error or failed
 * check, 2 usage error or unexpected failure.
 */
export async function runCommand(argv: string[], io: CommandIO): Promise<number> {
  const [command, ...rest] = argv;
  if (!command || command === "help" || command === "--help") {
    (command ? io.stdout : io.stderr)(usage());
    return command ? 0 : 2;
  }

  let output: OutputMode = "text";
  try {
    const args = parseArgs(rest);
    output = parseOutputMode(args);
    return await execute(command, args, output, io);
  } catch (error) {
    if (error instanceof UsageError) {
      io.stderr(`error: ${error.message}`);
      io.stderr(usage());
      return 2;
    }
    if (isRegistryError(error)) {
      if (output === "json") {
        io.stdout(JSON.stringify({ status: "error", command, error: error.toJSON() }, null, 2));
      } else {
        io.stderr(`error: [${error.code}] ${error.message}`);
      }
      return 1;
    }
    io.stderr(`error: ${describeError(error)}`);
    return 2;
  }
}
