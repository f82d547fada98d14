import type { ContainerBridge } from "../bridge/bridge.js";
import { createBridge, loadProject, type ProjectOptions } from "./context.js";
import { EXIT } from "./exit-codes.js";
import { failure, ok, type CommandOutput, type OutputFormat } from "./format.js";

/** Report whether the target container is running and healthy. */
export async function doctor(opts: ProjectOptions & { format?: OutputFormat; bridge?: ContainerBridge }): Promise<CommandOutput> {
  const format = opts.format ?? "human";
  try {
    const project = await loadProject(opts);
    const bridge = opts.bridge ?? createBridge(project);
    const status = await bridge.status();
    const exitCode = status.running ? EXIT.SUCCESS : EXIT.TARGET_UNREACHABLE;
    const { name, container } = project.target;

    if (format === "human") {
      const state = status.running ? "running" : "not running";
      return ok([`${name} (${container}): ${state}, health ${status.health}`], exitCode);
    }
    return ok([JSON.stringify({ target: name, container, running: status.running, health: status.health })], exitCode);
  } catch (e) {
    return failure(e, format);
  }
}
