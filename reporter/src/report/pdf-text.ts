/**
 * The standard Helvetica fonts only encode WinAnsi. Anything outside printable
 * Latin-1 becomes "?" so drawText never throws on a partition name.
 */
export function toWinAnsi(text: string): string {
  return text.replace(/[^\x20-\x7E\xA0-\xFF]/g, "?");
}
