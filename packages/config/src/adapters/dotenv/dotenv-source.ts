import fs from "node:fs"
import path from "node:path"
import { parse } from "dotenv"
import { ResolverError } from "../../core/errors/resolver-error"
import type { ValueSource } from "../../ports/value-source"

/**
 * Options for creating a dotenv value source.
 */
export type DotenvSourceOptions = {
  /**
   * Path to the .env file.
   *
   * Can be absolute or relative to `cwd`.
   *
   * @example ".env", ".env.local", "./config/.env.defaults"
   */
  file: string

  /**
   * Whether the file must exist.
   *
   * - `true`: reading throws a `source_unavailable` error if the file is missing.
   * - `false`: a missing file defines no values.
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
 * Values from a `.env` file. The file is read once, on first access.
 */
export class DotenvSource implements ValueSource {
  readonly name: string
  private values: Readonly<Record<string, string>> | undefined

  constructor(private readonly opts: DotenvSourceOptions) {
    this.name = `dotenv:${opts.file}`
  }

  read(name: string): string | undefined {
    const values = this.values ?? this.readFile()

    return Object.hasOwn(values, name) ? values[name] : undefined
  }

  load(): Record<string, string | undefined> {
    return { ...(this.values ?? this.readFile()) }
  }

  private readFile(): Readonly<Record<string, string>> {
    const cwd = this.opts.cwd ?? process.cwd()
    const filePath = path.resolve(cwd, this.opts.file)
    let content: string

    try {
      content = fs.readFileSync(filePath, "utf-8")
    } catch (err) {
      if (!this.opts.required && isErrnoException(err) && err.code === "ENOENT") {
        this.values = Object.freeze({})
        return this.values
      }

      throw new ResolverError(`Could not read ${filePath}`, {
        code: "source_unavailable",
        context: { source: this.name, file: filePath },
        cause: err,
      })
    }

    this.values = Object.freeze(parse(content))

    return this.values
  }
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err
}
