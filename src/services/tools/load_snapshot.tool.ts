import type { DataTable } from "../data/table";
import type { ToolArgs, ToolContext, ToolSpec } from "./tool.registry";

export const LOAD_SNAPSHOT_SPEC: ToolSpec = {
  name: "load_snapshot",
  description:
    "Load the full snapshot of a table from the analytics database (cached, read-only) as a DataFrame. "
    + "Use this first whenever the user asks about statistics, totals, averages or rankings in the data.",
  parameterSchema: {
    type: "object",
    properties: {
      table: {
        type: "string",
        description: "Table to load. Omit to use the default snapshot table.",
        pattern: "^[a-z_][a-z0-9_]*$",
      },
    },
    additionalProperties: false,
  },
};

export async function loadSnapshotTool(args: ToolArgs, context?: ToolContext): Promise<DataTable> {
  if (!context) {
    throw new Error("load_snapshot requires the orchestration context");
  }

  const table = typeof args.table === "string" && args.table.trim() ? args.table.trim() : context.defaultTable;
  return context.snapshots.loadTable(table);
}
