import { readFile, writeFile } from "node:fs/promises";
import { IOFailureError } from "../errors";
import type { Logger } from "../logging/logger";

function errnoCode(e: unknown): string | undefined {
  if (typeof e === "object" && e !== null && "code" in e && typeof e.code === "string") return e.code;
  return undefined;
}

function describeIo(action: "read" | "write", path: string, e: unknown): IOFailureError {
  switch (errnoCode(e)) {
    case "ENOENT":
      return new IOFailureError(
        action === "read" ? `File not found: ${path}` : `Directory does not exist for: ${path}`,
        path
      );
    case "EACCES":
    case "EPERM":
      return new IOFailureError(`Permission denied: ${path}`, path);
    case "EISDIR":
      return new IOFailureError(`Path is a directory: ${path}`, path);
    default:
      return new IOFailureError(`Cannot ${action} ${path}: ${e instanceof Error ? e.message : String(e)}`, path);
  }
}

export class FileService {
  constructor(private readonly logger: Logger) {}

  async readText(path: string): Promise<string> {
    try {
      const text = await readFile(path, "utf8");
      this.logger.debug({ path, chars: text.length }, "read file");
      return text;
    } catch (e) {
      throw describeIo("read", path, e);
    }
  }

  async writeText(path: string, content: string): Promise<void> {
    try {
      await writeFile(path, content, "utf8");
      this.logger.info({ path, chars: content.length }, "wrote file");
    } catch (e) {
      throw describeIo("write", path, e);
    }
  }
}
