// app/cli.ts
// chartprep <file> --kind <distribution|proportion|comparison|correlation> --x <col> [--y <col>]
//           [--view raw|prepared] [--policy fail|skip]
import { pathToFileURL } from "node:url";
import { parseArgs } from "node:util";

import { loadTable } from "./io/load";
import type { VisualizationRequest } from "./lib/charts";
import { PipelineError } from "./lib/errors";
import type { ColumnRef, Table } from "./lib/table";
import { createSession, type TableView } from "./session/session";

const USAGE =
  "usage: chartprep <file> --kind <distribution|proportion|comparison|correlation> --x <column> [--y <column>] [--view raw|prepared] [--policy fail|skip]";

const KINDS = ["distribution", "proportion", "comparison", "correlation"] as const;
type Kind = (typeof KINDS)[number];

function isKind(v: string): v is Kind {
  return KINDS.some((k) => k === v);
}

/** A name wins over an index when a column is literally called "3". */
function columnRef(table: Table, raw: string): ColumnRef {
  if (table.has(raw)) return raw;
  return /^\d+$/.test(raw) ? Number(raw) : raw;
}

function buildRequest(table: Table, kind: Kind, x: string, y: string | undefined): VisualizationRequest {
  if (kind === "distribution" || kind === "proportion") {
    return { kind, column: columnRef(table, x) };
  }
  if (y === undefined) throw new Error(`--y is required for ${kind}`);
  return { kind: "paired", mode: kind, x: columnRef(table, x), y: columnRef(table, y) };
}

export async function main(argv: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      kind: { type: "string" },
      x: { type: "string" },
      y: { type: "string" },
      view: { type: "string", default: "raw" },
      policy: { type: "string" },
    },
  });

  const file = positionals[0];
  const kind = values.kind;
  const view = values.view;
  if (!file || !kind || !isKind(kind) || values.x === undefined || (view !== "raw" && view !== "prepared")) {
    console.error(USAGE);
    return 2;
  }

  const policy = values.policy;
  if (policy !== undefined && policy !== "fail" && policy !== "skip") {
    console.error(USAGE);
    return 2;
  }

  try {
    const loaded = await loadTable(file);
    const session = createSession(loaded.table, {
      meta: { fileName: file, fileType: loaded.fileType, sheetName: loaded.sheetName },
      config: { columnPolicy: policy },
    });

    const target: TableView = view;
    const request = buildRequest(session.table(target), kind, values.x, values.y);
    const spec = session.visualize(target, request);

    console.log(JSON.stringify(spec, null, 2));
    return 0;
  } catch (err) {
    if (err instanceof PipelineError) console.error(err.format());
    else console.error("FAILED:", err instanceof Error ? err.message : err);
    return 1;
  }
}

const entry = process.argv[1];
if (entry && pathToFileURL(entry).href === import.meta.url) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      console.error("FAILED:", err);
      process.exitCode = 1;
    }
  );
}
