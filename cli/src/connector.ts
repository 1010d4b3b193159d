import type { ServerConfig } from "./config.js";
import { PythonConnector } from "./remote-resolve.js";
import type { ResolveConnector } from "./resolve-api.js";
import { SimulationConnector } from "./simulated-resolve.js";

export function createConnector(config: ServerConfig): ResolveConnector {
  if (config.mode === "simulation") {
    return new SimulationConnector();
  }
  return new PythonConnector({
    executable: config.python.executable,
    modulesPath: config.python.modules_path,
    libPath: config.python.lib_path,
  });
}
