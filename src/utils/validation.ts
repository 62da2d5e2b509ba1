export function validateNonEmptyString(value: unknown, fieldName: string): string {
  if (typeof value !== 'string') {
    throw new TypeError(`${fieldName} must be a string, received ${typeof value}`)
  }
  if (value.trim().length === 0) {
    throw new Error(`${fieldName} cannot be empty`)
  }
  return value
}

/**
 * Validate a `MAJOR[.MINOR[.PATCH]]` version string.
 */
export function validateVersionString(value: string, fieldName: string): string {
  const trimmed = value.trim()
  if (!/^\d+(?:\.\d+){0,2}$/.test(trimmed)) {
    throw new Error(`${fieldName} must look like MAJOR[.MINOR[.PATCH]], received: ${value}`)
  }
  return trimmed
}

/**
 * The `MAJOR.MINOR` part of a version. Command and package names carry no patch level.
 */
export function getMinorVersion(version: string): string {
  return version.split('.').slice(0, 2).join('.')
}
