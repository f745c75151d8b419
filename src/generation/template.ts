/**
 * Fill `{name}` placeholders in a prompt template.
 * Unknown placeholders are left untouched so a typo shows up in the prompt
 * rather than silently becoming an empty string.
 */
export function renderTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (match, key: string) =>
    Object.prototype.hasOwnProperty.call(values, key) ? values[key] : match
  );
}

/**
 * Format a feature list as newline-joined, dash-prefixed lines.
 */
export function formatFeatureList(features: readonly string[], placeholder: string): string {
  const cleaned = features.map((f) => f.trim()).filter((f) => f.length > 0);
  if (cleaned.length === 0) {
    return placeholder;
  }
  return cleaned.map((f) => `- ${f}`).join('\n');
}
