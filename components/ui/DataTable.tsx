import * as React from 'react';
import { clsx } from 'clsx';

export interface DataTableColumn<T> {
  key: string;
  header: string;
  render?: (row: T) => React.ReactNode;
}

export interface DataTableProps<T> {
  columns: DataTableColumn<T>[];
  data: readonly T[];
  rowKey: (row: T, index: number) => string;
  className?: string;
}

export function DataTable<T extends object>({ columns, data, rowKey, className }: DataTableProps<T>) {
  if (data.length === 0) return null;

  const cell = (row: T, col: DataTableColumn<T>): React.ReactNode => {
    if (col.render) return col.render(row);
    const value: unknown = Reflect.get(row, col.key);
    return value === undefined || value === null ? '' : String(value);
  };

  return (
    <table className={clsx('table', className)}>
      <thead>
        <tr>
          {columns.map((col) => (
            <th key={col.key} scope="col">
              {col.header}
            </th>
          ))}
        </tr>
      </thead>
      <tbody>
        {data.map((row, i) => (
          <tr key={rowKey(row, i)}>
            {columns.map((col) => (
              <td key={col.key}>{cell(row, col)}</td>
            ))}
          </tr>
        ))}
      </tbody>
    </table>
  );
}
