import type { ReactNode } from "react";

import type { ExportTableId } from "~/utils/export";

export interface DataColumn<T> {
  key: string;
  label: string;
  render: (row: T) => ReactNode;
  numeric?: boolean;
}

interface DataTableProps<T> {
  title: string;
  rows: T[];
  columns: DataColumn<T>[];
  rowKey: (row: T, index: number) => string;
  emptyMessage?: string;
  exportTable?: ExportTableId;
}

export function DataTable<T>({ title, rows, columns, rowKey, emptyMessage, exportTable }: DataTableProps<T>) {
  return (
    <section className="tickets-panel">
      <div className="panel-heading">
        <h2>{title}</h2>
        {exportTable && rows.length ? (
          <a className="btn-ghost" href={`/export/${exportTable}`} download>
            Download CSV
          </a>
        ) : null}
      </div>
      {rows.length === 0 ? (
        <p>{emptyMessage ?? "No rows to show."}</p>
      ) : (
        <div className="table-scroll">
          <table className="data-table">
            <thead>
              <tr>
                {columns.map((column) => (
                  <th key={column.key} data-numeric={column.numeric ? "true" : undefined}>
                    {column.label}
                  </th>
                ))}
              </tr>
            </thead>
            <tbody>
              {rows.map((row, index) => (
                <tr key={rowKey(row, index)}>
                  {columns.map((column) => (
                    <td key={column.key} data-numeric={column.numeric ? "true" : undefined}>
                      {column.render(row)}
                    </td>
                  ))}
                </tr>
              ))}
            </tbody>
          </table>
        </div>
      )}
    </section>
  );
}

export default DataTable;
