import path from "node:path";
import type { DockerConfig } from "../types/config.js";
import type { RunDefinition } from "../types/run.js";

/** Path of a config file as seen from inside the container. */
export function containerConfigPath(docker: DockerConfig, configFilename: string): string {
  return `${docker.containerUserDataPath.replace(/\/+$/, "")}/${configFilename.replace(/^\/+/, "")}`;
}

function volumeArgs(docker: DockerConfig): string[] {
  return ["-v", `${docker.hostUserDataPath}:${docker.containerUserDataPath}`];
}

export function buildHyperoptArgs(run: RunDefinition, docker: DockerConfig): string[] {
  const args = [
    "run",
    "-it",
    "--rm",
    ...volumeArgs(docker),
    docker.image,
    "hyperopt",
    "--config",
    containerConfigPath(docker, run.config),
    "--strategy",
    run.strategy,
    "--hyperopt-loss",
    run.lossFunction ?? docker.defaultLossFunction,
    "--epochs",
    run.epochs,
    "--timerange",
    run.timerange,
  ];
  if (run.spaces) args.push("--spaces", run.spaces);
  args.push("-j", run.jobs ?? String(docker.defaultJobWorkers));
  if (run.minTrades) args.push("--min-trades", run.minTrades);
  if (run.randomState) args.push("--random-state", run.randomState);
  return args;
}

/** `hyperopt-show` for the best epoch of one result file, colour off. */
export function buildShowArgs(
  docker: DockerConfig,
  configFilename: string,
  resultFile: string,
): string[] {
  return [
    "run",
    "--rm",
    ...volumeArgs(docker),
    docker.image,
    "hyperopt-show",
    "--config",
    containerConfigPath(docker, configFilename),
    "--hyperopt-filename",
    path.basename(resultFile),
    "--best",
    "-n",
    "1",
    "--no-color",
  ];
}
