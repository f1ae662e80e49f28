import { promises as fs } from "fs";
import type { Prompter } from "./prompt.js";

export const PROJECT_FILE = "project_info";

/**
 * Project id stored in `file`, or asked for and saved there when the file
 * does not exist yet.
 */
export async function getProjectId(file: string, prompter: Prompter): Promise<string> {
  try {
    return (await fs.readFile(file, "utf-8")).trim();
  } catch (error) {
    if (!(error instanceof Error && "code" in error && error.code === "ENOENT")) {
      throw error;
    }
  }

  const projectId = (await prompter.ask("Enter your Cloud Storage project id (found in the API console): ")).trim();
  await fs.writeFile(file, projectId, "utf-8");
  return projectId;
}
