/**
 * URL- and file-safe slug of a title: ASCII letters and digits separated by single dashes.
 * Titles with nothing usable (e.g. only CJK characters) fall back to `post-YYYYMMDD-HHMM<NNN>`,
 * with the UTC time of `now` and a random NNN in 100-999.
 */
export function slugify(title: string, now: Date = new Date(), random: () => number = Math.random): string {
  const slug = title
    .normalize("NFKD")
    .replace(/[^\x00-\x7f]/g, "")
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
  if (slug) {
    return slug;
  }
  return `post-${timestamp(now)}${100 + Math.floor(random() * 900)}`;
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

function timestamp(date: Date): string {
  const day = `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}`;
  return `${day}-${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}`;
}
