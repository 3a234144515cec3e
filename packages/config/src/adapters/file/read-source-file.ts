import fs from "node:fs/promises"
import path from "node:path"

export type FileSourceOptions = {
  /**
   * Path to the file, absolute or relative to `cwd`.
   *
   * @example "appsettings.json", ".env.production"
   */
  file: string

  /**
   * Whether the file must exist. A missing optional file loads as empty.
   */
  required: boolean

  /**
   * Base directory for resolving relative paths.
   *
   * @default process.cwd()
   */
  cwd?: string
}

/**
 * Reads a configuration file, or returns undefined when an optional file is missing.
 */
export async function readSourceFile(opts: FileSourceOptions): Promise<string | undefined> {
  const filePath = path.resolve(opts.cwd ?? process.cwd(), opts.file)

  try {
    return await fs.readFile(filePath, "utf-8")
  } catch (err) {
    if (!opts.required && isNotFound(err)) return undefined
    throw err
  }
}

function isNotFound(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT"
}
