/**
 * sublisp help - topic reference
 */
import { describeArity } from "@sublisp/core";
import { getPrimitives } from "@sublisp/std";
import { QUICKREF, TOPICS, TOPIC_LIST } from "./help-content.js";

export { QUICKREF };

function resolveTopic(topic: string): string | null {
  const normalized = topic.toLowerCase().trim();

  // Guard against prototype-chain keys like "constructor" or "__proto__".
  if (Object.prototype.hasOwnProperty.call(TOPICS, normalized)) {
    return normalized;
  }

  // Prefix matching: "ex" -> "examples"
  const matches = TOPIC_LIST.filter((t) => t.startsWith(normalized));
  if (matches.length === 1) {
    return matches[0];
  }

  return null;
}

function renderStdlibIndex(): string {
  const prims = [...getPrimitives().values()].sort((a, b) => a.name.localeCompare(b.name));
  const width = Math.max(...prims.map((p) => p.name.length));
  return [
    "SUBLISP PRIMITIVE INDEX",
    "=======================",
    "",
    ...prims.map((p) => `  ${p.name.padEnd(width, " ")}  args: ${describeArity(p.arity).padEnd(12, " ")}${p.doc ?? ""}`),
    "",
    `Total: ${prims.length}`,
  ].join("\n");
}

function renderUsage(commands: string[]): string {
  return ["Usage:", ...commands.map((command) => `  ${command}`)].join("\n");
}

function renderTopicList(): string {
  return ["Available topics:", ...TOPIC_LIST.map((name) => `  - ${name}`)].join("\n");
}

export function runHelp(topic?: string, opts: { index?: boolean } = {}): void {
  if (opts.index) {
    if (!topic || resolveTopic(topic) !== "stdlib") {
      console.error("The --index flag is only supported with the stdlib topic.");
      console.error(renderUsage(["sublisp help stdlib --index"]));
      process.exitCode = 1;
      return;
    }
    console.log(renderStdlibIndex());
    return;
  }

  if (!topic) {
    console.log(QUICKREF);
    return;
  }

  const resolved = resolveTopic(topic);
  if (resolved) {
    console.log(TOPICS[resolved]);
    return;
  }

  console.error(`Unknown help topic: "${topic}"`);
  console.error(renderTopicList());
  console.error(renderUsage(["sublisp help <topic>", "sublisp help stdlib --index"]));
  process.exitCode = 1;
}
