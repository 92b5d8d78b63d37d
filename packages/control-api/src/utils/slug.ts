export const MAX_LABEL_LENGTH = 63;

/**
 * Turns a free-form project slug into a DNS label: lower-case ASCII
 * letters, digits and single dashes, never starting or ending with a dash,
 * at most 63 characters.
 * Spaces, underscores, dots and slashes become dashes; anything else is
 * dropped. Returns an empty string when nothing usable is left.
 */
export function toHostnameLabel(value: string) {
  return value
    .toLowerCase()
    .replace(/[\s_./]+/g, "-")
    .replace(/[^a-z0-9-]/g, "")
    .replace(/-+/g, "-")
    .replace(/^-/, "")
    .slice(0, MAX_LABEL_LENGTH)
    .replace(/-$/, "");
}

/** `label-N`, shortening `label` so the result stays a valid DNS label. */
export function withSuffix(label: string, attempt: number) {
  if (attempt === 0) {
    return label;
  }
  const suffix = `-${attempt}`;
  const head = label.slice(0, MAX_LABEL_LENGTH - suffix.length).replace(/-$/, "");
  return `${head}${suffix}`;
}

/** Project slug from a display name, `project` when nothing usable is left. */
export function slugify(name: string) {
  return toHostnameLabel(name) || "project";
}

/**
 * Extracts `owner` and `name` from a repository URL such as
 * `https://github.com/acme/web.git` or `git@github.com:acme/web.git`.
 */
export function parseRepositoryUrl(
  url: string,
): { owner: string; name: string } | null {
  const match = url.match(/[/:]([^/:]+)\/([^/]+?)(?:\.git)?\/?$/);
  if (!match?.[1] || !match[2]) {
    return null;
  }
  return { owner: match[1], name: match[2] };
}
