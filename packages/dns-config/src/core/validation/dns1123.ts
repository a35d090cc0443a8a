const DNS1123_LABEL_MAX_LENGTH = 63
const DNS1123_SUBDOMAIN_MAX_LENGTH = 253

const dns1123LabelRegex = /^[a-z0-9]([-a-z0-9]*[a-z0-9])?$/

/**
 * Lowercase alphanumerics and `-`, 1-63 characters, starting and ending
 * with an alphanumeric.
 */
export function isDns1123Label(value: string): boolean {
  return value.length <= DNS1123_LABEL_MAX_LENGTH && dns1123LabelRegex.test(value)
}

/**
 * Dot-separated DNS-1123 labels, at most 253 characters. A trailing dot is
 * not accepted.
 */
export function isDns1123Subdomain(value: string): boolean {
  if (value.length === 0 || value.length > DNS1123_SUBDOMAIN_MAX_LENGTH) return false

  return value.split(".").every(isDns1123Label)
}
