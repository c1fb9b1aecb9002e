import { ConfigurationError } from "../errors/logger-error"

/**
 * @throws ConfigurationError when the label is empty or whitespace only.
 */
export function validateLabel(label: string): string {
  if (label.trim().length === 0) {
    throw new ConfigurationError("invalid_label", "Logger label must not be blank", { label })
  }

  return label
}

/**
 * A label used as a file or directory name must stay a single path segment.
 *
 * @throws ConfigurationError when the label contains a path separator or is
 * `.` or `..`.
 */
export function validatePathLabel(label: string): string {
  validateLabel(label)

  if (/[\\/]/.test(label) || label === "." || label === "..") {
    throw new ConfigurationError(
      "invalid_label",
      `Logger label "${label}" can't be used as a path segment`,
      { label },
    )
  }

  return label
}
