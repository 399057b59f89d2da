/**
 * Terminal chat surface: slash commands to pick the memory technique, window
 * and temperature; every other line is a chat turn.
 */

import * as readline from "node:readline";

import {
  InvalidPolicyParamsError,
  UnknownPolicyKindError,
} from "../../stage-1-chat-memory/src/errors.js";
import {
  describePolicy,
  isWindowed,
  parsePolicySpec,
  POLICY_KINDS,
} from "../../stage-1-chat-memory/src/policy.js";
import type {
  PolicySpec,
  UsageSnapshot,
} from "../../stage-1-chat-memory/src/types.js";
import { renderHistory, renderOverview, renderUsage } from "./render.js";
import { formatSessionKey } from "./session-store.js";
import type { ChatOrchestrator, SessionKey } from "./types.js";

export const DEFAULT_WINDOW_SIZE = 6;

export const HELP_LINES: readonly string[] = [
  "/policy <kind> [window]  switch memory technique (" +
    POLICY_KINDS.join(", ") +
    ")",
  "/window <n>              change window size for windowed techniques",
  "/temp <t>                set temperature (0-1)",
  "/clear                   clear the current history",
  "/new                     start a new session id",
  "/history                 show memory state",
  "/sessions                list live histories",
  "/usage                   show token usage of the last turn",
  "/exit                    quit",
];

export type ReplOutcome = "continue" | "exit";

export interface ChatReplOptions {
  orchestrator: ChatOrchestrator;
  policy: PolicySpec;
  temperature: number;
  sessionId?: string;
  write: (line: string) => void;
}

export interface ChatRepl {
  handle(line: string): Promise<ReplOutcome>;
  currentKey(): SessionKey;
  currentTemperature(): number;
}

function isPolicyInputError(
  error: unknown
): error is UnknownPolicyKindError | InvalidPolicyParamsError {
  return (
    error instanceof UnknownPolicyKindError ||
    error instanceof InvalidPolicyParamsError
  );
}

/** `/policy sliding window 4` → kind "sliding window", window 4. */
function splitPolicyArgs(args: string[]): { kind: string; window?: number } {
  const last = args[args.length - 1];
  if (args.length > 1 && last !== undefined && /^-?\d+(\.\d+)?$/.test(last)) {
    return { kind: args.slice(0, -1).join(" "), window: Number(last) };
  }
  return { kind: args.join(" ") };
}

export function createChatRepl(options: ChatReplOptions): ChatRepl {
  const { orchestrator, write } = options;
  let policy = options.policy;
  let windowSize = isWindowed(policy) ? policy.windowSize : DEFAULT_WINDOW_SIZE;
  let temperature = options.temperature;
  let sessionId = options.sessionId ?? orchestrator.newSessionId();
  let lastUsage: UsageSnapshot | undefined;

  const key = (): SessionKey => ({ sessionId, policy });

  // 只处理调用方输入错误；其他异常照常抛出
  function applyPolicy(input: { kind: unknown; windowSize: number }): void {
    try {
      policy = parsePolicySpec(input);
    } catch (error) {
      if (!isPolicyInputError(error)) {
        throw error;
      }
      write(`! ${error.message}`);
      return;
    }
    if (isWindowed(policy)) {
      windowSize = policy.windowSize;
    }
    write(`Memory: ${describePolicy(policy)}`);
  }

  async function chat(line: string): Promise<void> {
    const result = await orchestrator.turn(line, key(), { temperature });
    if (result.status === "empty") {
      return;
    }
    lastUsage = result.usage;
    write(`AI: ${result.reply}`);
    write(renderUsage(result.usage));
  }

  function command(name: string, args: string[]): ReplOutcome {
    switch (name) {
      case "help":
        HELP_LINES.forEach((line) => write(line));
        break;
      case "policy": {
        if (args.length === 0) {
          write("Usage: /policy <kind> [window]");
          break;
        }
        const { kind, window } = splitPolicyArgs(args);
        applyPolicy({ kind, windowSize: window ?? windowSize });
        break;
      }
      case "window": {
        if (!isWindowed(policy)) {
          write(`${describePolicy(policy)} has no window.`);
          break;
        }
        applyPolicy({ kind: policy.kind, windowSize: Number(args[0]) });
        break;
      }
      case "temp": {
        const value = Number(args[0]);
        const valid = Number.isFinite(value) && value >= 0 && value <= 1;
        if (args.length === 0 || !valid) {
          write("Usage: /temp <number between 0 and 1>");
          break;
        }
        temperature = value;
        write(`Temperature: ${temperature}`);
        break;
      }
      case "clear":
        orchestrator.clear(key());
        lastUsage = undefined;
        write("History cleared.");
        break;
      case "new":
        sessionId = orchestrator.newSessionId();
        lastUsage = undefined;
        write(`New session: ${sessionId}`);
        break;
      case "history": {
        const messages = orchestrator.history(key());
        write(renderOverview(key(), messages));
        write(renderHistory(messages));
        break;
      }
      case "sessions": {
        const keys = orchestrator.sessions();
        const current = formatSessionKey(key());
        write(`Live histories: ${keys.length}`);
        keys.forEach((id) => write(`${id === current ? "*" : " "} ${id}`));
        break;
      }
      case "usage":
        write(lastUsage ? renderUsage(lastUsage) : "No turns yet.");
        break;
      case "exit":
      case "quit":
        return "exit";
      default:
        write(`Unknown command: /${name} (type /help)`);
    }
    return "continue";
  }

  return {
    async handle(line: string): Promise<ReplOutcome> {
      const trimmed = line.trim();
      if (trimmed.startsWith("/")) {
        const [name = "", ...args] = trimmed.slice(1).split(/\s+/);
        return command(name.toLowerCase(), args);
      }
      await chat(line);
      return "continue";
    },

    currentKey: key,

    currentTemperature(): number {
      return temperature;
    },
  };
}

export interface RunChatReplOptions extends Omit<ChatReplOptions, "write"> {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}

/** Wire a ChatRepl to stdin/stdout until `/exit` or end of input. */
export async function runChatRepl(options: RunChatReplOptions): Promise<void> {
  const output = options.output ?? process.stdout;
  const rl = readline.createInterface({
    input: options.input ?? process.stdin,
    output,
  });
  const repl = createChatRepl({
    ...options,
    write: (line) => output.write(`${line}\n`),
  });

  const { sessionId, policy } = repl.currentKey();
  output.write(
    `Session ${sessionId} | ${describePolicy(policy)} | /help for commands\n`
  );
  rl.setPrompt("> ");
  rl.prompt();

  try {
    for await (const line of rl) {
      if ((await repl.handle(line)) === "exit") {
        break;
      }
      rl.prompt();
    }
  } finally {
    rl.close();
  }
}
