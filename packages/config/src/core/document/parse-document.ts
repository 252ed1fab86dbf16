import { ResolverError } from "../errors/resolver-error"
import { isJsonArray, isJsonObject, type JsonObject } from "../json/json-value"
import { parseJson } from "../json/parse-json"

/**
 * Parse document text. The root must be a JSON object.
 *
 * @throws ResolverError (`invalid_json`, `invalid_root` or `number_out_of_range`)
 */
export function parseDocument(text: string): JsonObject {
  const root = parseJson(text)

  if (!isJsonObject(root)) {
    throw new ResolverError("Document root must be a JSON object", {
      code: "invalid_root",
      context: { root: root === null ? "null" : isJsonArray(root) ? "array" : typeof root },
    })
  }

  return root
}
