import {
  createProvisionPlan,
  type ProvisionConfig,
  renderDockerfile,
} from "@dockhand/core";
import { writeFile } from "fs/promises";
import { resolve } from "path";
import { fileExists } from "@/lib/fs";
import { log } from "@/lib/log";

export type RenderOptions = {
  config: ProvisionConfig;
  /** Write to this file instead of returning content only */
  output?: string;
  force?: boolean;
};

export type RenderResult = {
  content: string;
  outputPath?: string;
};

/**
 * Render the container build descriptor for a config.
 */
export async function render(options: RenderOptions): Promise<RenderResult> {
  const plan = createProvisionPlan(options.config);
  const content = renderDockerfile(plan);

  if (!options.output) {
    return { content };
  }

  const outputPath = resolve(options.output);
  if (!options.force && (await fileExists(outputPath))) {
    throw new Error(`${outputPath} already exists. Use --force to overwrite.`);
  }

  await writeFile(outputPath, content, "utf8");
  log.debug(`Wrote descriptor: ${outputPath}`);

  return { content, outputPath };
}
