const CONTROL_CHARS = /[\u0000-\u0008\u000b\u000c\u000e-\u001f\u007f]/g;
const NON_PHONE = /[^\d+]/g;

/** Drops control characters (line breaks and tabs stay) and trims. Other characters are stored as given. */
export function sanitizePlainText(value: string): string {
  return value.replace(CONTROL_CHARS, "").trim();
}

/** Strips everything but digits and a leading-plus marker. */
export function sanitizePhone(value: string): string {
  return value.replace(CONTROL_CHARS, "").replace(NON_PHONE, "");
}

/** Like sanitizePlainText, but an empty result collapses to null. */
export function sanitizeOptionalText(value: string | null | undefined): string | null | undefined {
  if (value === undefined || value === null) {
    return value;
  }
  const cleaned = sanitizePlainText(value);
  return cleaned.length > 0 ? cleaned : null;
}
