import { format } from "node:util"
import { errorText } from "./utils/error-text"

/**
 * Fills a printf-style template (`%s`, `%d`, `%i`, `%f`, `%j`, `%o`, `%O`, `%%`).
 *
 * Follows `util.format`: a placeholder without an argument is left in place and
 * surplus arguments are appended, separated by a space. When formatting fails,
 * as `%j` does for a `bigint`, the arguments are joined as by {@link joinArgs}.
 */
export function formatTemplate(template: string, args: readonly unknown[]): string {
  try {
    return format(template, ...args)
  } catch {
    return joinArgs(args)
  }
}

/**
 * Concatenates the display text of each argument, with no separator.
 */
export function joinArgs(args: readonly unknown[]): string {
  return args.map(errorText).join("")
}
