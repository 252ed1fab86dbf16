import type { Logger } from "@envdoc/logger"
import type { ValueSource } from "../../ports/value-source"
import { ResolverError, isResolverError } from "../errors/resolver-error"
import { type ChunkedText, readChunkedText } from "./chunked-text"
import { ConfigDocument } from "./config-document"
import { parseDocument } from "./parse-document"

export type DocumentLoaderOptions = {
  source: ValueSource
  variable: string
  logger: Logger
}

/**
 * Materializes the configuration document on first use.
 *
 * Failures never escape: they are logged once and the empty document is
 * used instead.
 */
export class DocumentLoader {
  private readonly source: ValueSource
  private readonly variable: string
  private readonly logger: Logger
  private document: ConfigDocument | undefined

  constructor(opts: DocumentLoaderOptions) {
    this.source = opts.source
    this.variable = opts.variable
    this.logger = opts.logger.child({
      module: "document-loader",
      source: opts.source.name,
      variable: opts.variable,
    })
  }

  get isMaterialized(): boolean {
    return this.document !== undefined
  }

  materialize(): ConfigDocument {
    this.document ??= this.load()

    return this.document
  }

  private load(): ConfigDocument {
    let input: ChunkedText

    try {
      input = readChunkedText(this.source, this.variable)
    } catch (err) {
      const cause = isResolverError(err)
        ? err
        : new ResolverError(`Value source ${this.source.name} could not be read`, {
            code: "source_unavailable",
            context: { source: this.source.name },
            cause: err,
          })

      return this.fail(cause, [])
    }

    const { text, variables } = input

    if (!text) {
      this.logger.debug("No configuration document provided")

      return ConfigDocument.empty({ source: this.source.name, variables })
    }

    try {
      const root = parseDocument(text)
      const document = ConfigDocument.of(root, {
        status: "parsed",
        source: this.source.name,
        variables,
      })

      this.logger.debug("Configuration document loaded", { chunks: variables.length })

      return document
    } catch (err) {
      return this.fail(err, variables)
    }
  }

  private fail(err: unknown, variables: string[]): ConfigDocument {
    this.logger.error(`Invalid JSON passed to ${this.variable}`, {
      err,
      chunks: variables.length,
      variables,
    })

    return ConfigDocument.empty({ status: "invalid", source: this.source.name, variables })
  }
}
