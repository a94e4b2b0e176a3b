// src/common/names.ts

/** "Ada King Lovelace" -> first "Ada", last "King Lovelace". */
export function splitFullName(fullName: string): { firstName: string; lastName: string } {
  const trimmed = fullName.trim();
  const i = trimmed.indexOf(' ');
  if (i < 0) return { firstName: trimmed, lastName: '' };
  return { firstName: trimmed.slice(0, i), lastName: trimmed.slice(i + 1).trim() };
}

export function joinName(firstName: string | null | undefined, lastName: string | null | undefined): string {
  return `${firstName ?? ''} ${lastName ?? ''}`.trim();
}
