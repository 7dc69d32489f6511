import { LOAD_SNAPSHOT_SPEC, loadSnapshotTool } from "./load_snapshot.tool";
import { makePlanSpec } from "./make_plan.tool";
import { NL_TO_CODE_SPEC, nlToCodeTool } from "./nl_to_code.tool";
import { ToolRegistry } from "./tool.registry";

export function createDefaultToolRegistry(): ToolRegistry {
  const registry = new ToolRegistry()
    .register("load_snapshot", loadSnapshotTool, LOAD_SNAPSHOT_SPEC, {
      needsContext: true,
      phases: ["execution"],
    })
    .register("nl_to_code", nlToCodeTool, NL_TO_CODE_SPEC, {
      needsContext: true,
      phases: ["execution"],
    });

  return registry.register("make_plan", null, makePlanSpec(registry.listSpecs("execution")), {
    needsContext: false,
    phases: ["planning"],
  });
}
