/**
 * Field name helpers
 */

/**
 * `first_name` → `First Name`
 */
export function humanizeFieldName(name: string): string {
  return name
    .split(/[_\s]+/)
    .filter((word) => word.length > 0)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}
