/**
 * A1 range for a sheet, with the sheet name quoted so names containing
 * spaces, `!` or quotes address the right tab.
 */
export function sheetRange(sheetName: string, cells?: string): string {
  const quoted = `'${sheetName.replace(/'/g, "''")}'`;
  return cells ? `${quoted}!${cells}` : quoted;
}
