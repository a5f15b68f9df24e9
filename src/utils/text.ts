/** Single-line form of a post title for terminal output, cut with an ellipsis past `maxLength`. */
export function displayTitle(title: string, maxLength: number = 120): string {
  const flat = title.replace(/\s+/g, ' ').trim();
  if (!flat) {
    return '(untitled)';
  }
  return flat.length <= maxLength ? flat : `${flat.slice(0, maxLength - 1)}…`;
}
