import Table from 'cli-table3';

export function formatTable(head: string[], rows: string[][]): string {
  const table = new Table({ head, style: { head: ['bold'] } });
  rows.forEach((row) => table.push(row));
  return table.toString();
}
