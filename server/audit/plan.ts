import { readFile } from "fs/promises";
import { PlanNotFoundError } from "./errors";

/** Reads an audit plan verbatim. Its content is handed to the LLM untouched. */
export async function loadPlan(path: string): Promise<string> {
  try {
    return await readFile(path, "utf-8");
  } catch (error) {
    if (error instanceof Error && "code" in error && (error.code === "ENOENT" || error.code === "EISDIR")) {
      throw new PlanNotFoundError(path);
    }
    throw error;
  }
}
