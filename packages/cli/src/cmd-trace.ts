/**
 * sublisp trace - trace summary command
 */
import * as fs from "node:fs";
import { z } from "zod";

const traceLineSchema = z.object({
  ts: z.string(),
  runId: z.string(),
  event: z.string(),
  data: z.record(z.unknown()).optional(),
});

type TraceLine = z.infer<typeof traceLineSchema>;

export interface TraceSummary {
  runId: string;
  totalEvents: number;
  runs: number;
  nativeCalls: number;
  nativesByName: Record<string, number>;
  lambdaApplications: number;
  failures: number;
  budgetExceeded: number;
  malformedLines: number;
  startTime?: string;
  endTime?: string;
  durationMs?: number;
}

function parseLine(line: string): TraceLine | null {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch (e) {
    if (e instanceof SyntaxError) return null;
    throw e;
  }
  const result = traceLineSchema.safeParse(raw);
  return result.success ? result.data : null;
}

export function summarize(events: TraceLine[], malformedLines: number): TraceSummary {
  const summary: TraceSummary = {
    runId: events[0]?.runId ?? "unknown",
    totalEvents: events.length,
    runs: 0,
    nativeCalls: 0,
    nativesByName: {},
    lambdaApplications: 0,
    failures: 0,
    budgetExceeded: 0,
    malformedLines,
  };

  for (const ev of events) {
    switch (ev.event) {
      case "run_start":
        summary.runs++;
        summary.startTime ??= ev.ts;
        break;
      case "run_end":
        summary.endTime = ev.ts;
        if (ev.data?.["error"] !== undefined) summary.failures++;
        break;
      case "native_start": {
        summary.nativeCalls++;
        const procedure = ev.data?.["procedure"];
        const name = typeof procedure === "string" ? procedure : "unknown";
        summary.nativesByName[name] = (summary.nativesByName[name] ?? 0) + 1;
        break;
      }
      case "lambda_apply":
        summary.lambdaApplications++;
        break;
      case "budget_exceeded":
        summary.budgetExceeded++;
        break;
    }
  }

  if (summary.startTime && summary.endTime) {
    summary.durationMs = new Date(summary.endTime).getTime() - new Date(summary.startTime).getTime();
  }
  return summary;
}

export async function runTrace(file: string, opts: { json?: boolean }): Promise<number> {
  let content: string;
  try {
    content = fs.readFileSync(file, "utf-8");
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    console.error(`Error reading trace file: ${msg}`);
    return 4;
  }

  const lines = content.split("\n").filter((l) => l.trim());
  const events: TraceLine[] = [];
  let malformed = 0;
  for (const line of lines) {
    const ev = parseLine(line);
    if (ev) events.push(ev);
    else malformed++;
  }

  if (events.length === 0) {
    console.error("No valid trace events found.");
    return 4;
  }

  const summary = summarize(events, malformed);

  if (opts.json) {
    console.log(JSON.stringify(summary, null, 2));
    return 0;
  }

  console.log(`Trace Summary`);
  console.log(`  Run ID:              ${summary.runId}`);
  console.log(`  Total events:        ${summary.totalEvents}`);
  console.log(`  Top-level runs:      ${summary.runs}`);
  console.log(`  Lambda applications: ${summary.lambdaApplications}`);
  console.log(`  Native calls:        ${summary.nativeCalls}`);
  if (Object.keys(summary.nativesByName).length > 0) {
    console.log(`  Natives used:`);
    for (const [name, count] of Object.entries(summary.nativesByName)) {
      console.log(`    ${name}: ${count}`);
    }
  }
  console.log(`  Failures:            ${summary.failures}`);
  console.log(`  Budget exceeded:     ${summary.budgetExceeded}`);
  if (summary.malformedLines > 0) {
    console.log(`  Malformed lines:     ${summary.malformedLines}`);
  }
  if (summary.durationMs !== undefined) {
    console.log(`  Duration:            ${summary.durationMs}ms`);
  }
  return 0;
}
