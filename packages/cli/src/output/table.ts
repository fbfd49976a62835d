import Table from 'cli-table3';

export type TableRow = Record<string, string | number>;

export function formatTable(data: TableRow[], options?: Table.TableConstructorOptions): string {
  const head = options?.head ?? Object.keys(data[0] ?? {});
  const table = new Table({ head, ...options });
  data.forEach((row) => table.push(Object.values(row).map((v) => String(v))));
  return table.toString();
}

export function printTable(data: TableRow[], options?: Table.TableConstructorOptions) {
  console.log(formatTable(data, options));
}
