import fs from "node:fs/promises"
import path from "node:path"
import { parse } from "dotenv"
import type { EnvLookupResult, Environment } from "../../ports/environment"

/**
 * Options for loading a dotenv file.
 */
export type DotenvEnvironmentOptions = {
  /**
   * Path to the .env file, absolute or relative to `cwd`.
   *
   * @example ".env", ".env.production", "./config/.env.defaults"
   */
  file: string

  /**
   * - `true`: loading fails if the file does not exist.
   * - `false`: a missing file yields an empty environment.
   */
  required: boolean

  /**
   * @default process.cwd()
   */
  cwd?: string
}

/**
 * A snapshot of the variables in a dotenv file. The file is read once by
 * {@link DotenvEnvironment.load}; lookups never touch the filesystem.
 */
export class DotenvEnvironment implements Environment {
  readonly name: string
  private readonly values: ReadonlyMap<string, string>

  private constructor(file: string, values: Record<string, string>) {
    this.name = `dotenv:${file}`
    this.values = new Map(Object.entries(values))
  }

  static async load(opts: DotenvEnvironmentOptions): Promise<DotenvEnvironment> {
    const cwd = opts.cwd ?? process.cwd()
    const filePath = path.resolve(cwd, opts.file)

    try {
      const content = await fs.readFile(filePath, "utf-8")

      return new DotenvEnvironment(opts.file, parse(content))
    } catch (err) {
      if (!opts.required && isNotFound(err)) {
        return new DotenvEnvironment(opts.file, {})
      }
      throw err
    }
  }

  lookup(key: string): EnvLookupResult {
    const value = this.values.get(key)

    return value === undefined ? { kind: "not_found" } : { kind: "found", value }
  }

  keys(): string[] {
    return [...this.values.keys()]
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT"
}
