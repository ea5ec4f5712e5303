import React, { useState, useMemo } from 'react';
import {
  BarChart, Bar, LineChart, Line, XAxis, YAxis, CartesianGrid, Tooltip, ResponsiveContainer,
  PieChart, Pie, Cell, Legend
} from 'recharts';
import { CURRENCY_COLUMNS, type Dataset, type FilterCriteria, type SalesRecord } from '../types';
import { defaultCriteria } from '../services/filters';
import { render } from '../services/render';
import { columnValue, exportColumns, exportCsv, EXPORT_FILE_NAME, EXPORT_MIME_TYPE } from '../services/export';
import { downloadFile } from '../services/download';
import { formatCurrency, formatNumber } from '../services/formatters';
import {
  BarChart3, Globe, ShoppingCart, TrendingUp, Tag, Package, Filter, XCircle, Calendar,
  Download, ChevronLeft, ChevronRight
} from 'lucide-react';

interface DashboardProps {
  dataset: Dataset;
  onReset: () => void;
}

const BRAND_PRIMARY = '#4f46e5';
const COLORS = [BRAND_PRIMARY, '#818cf8', '#0ea5e9', '#14b8a6', '#f59e0b', '#ef4444', '#a855f7', '#64748b'];

const currencyColumns = new Set<string>(CURRENCY_COLUMNS);

const tooltipValue = (value: unknown) => (typeof value === 'number' ? formatCurrency(value) : String(value));

const toggle = (selected: readonly string[], option: string): string[] =>
  selected.includes(option) ? selected.filter(s => s !== option) : [...selected, option];

const cellText = (record: SalesRecord, column: string): string => {
  if (currencyColumns.has(column)) return formatCurrency(Number(columnValue(record, column)), true);
  if (column === 'Units_Sold') return formatNumber(record.unitsSold);
  return columnValue(record, column);
};

const Dashboard: React.FC<DashboardProps> = ({ dataset, onReset }) => {
  const [criteria, setCriteria] = useState<FilterCriteria>(() => defaultCriteria(dataset));

  // Pagination State
  const [rowsPerPage, setRowsPerPage] = useState(10);
  const [currentPage, setCurrentPage] = useState(1);

  const view = useMemo(() => render(dataset, criteria), [dataset, criteria]);
  const tableColumns = useMemo(() => exportColumns(dataset.columns), [dataset.columns]);
  const { options, summary } = view;

  const updateCriteria = (patch: Partial<FilterCriteria>) => {
    setCriteria(prev => ({ ...prev, ...patch }));
    setCurrentPage(1);
  };

  const isFiltered =
    criteria.countries.length > 0 ||
    criteria.products.length > 0 ||
    criteria.dateRange.start !== options.dateSpan.start ||
    criteria.dateRange.end !== options.dateSpan.end;

  const totalPages = Math.max(1, Math.ceil(view.records.length / rowsPerPage));
  const paginatedRecords = useMemo(() => {
    const start = (currentPage - 1) * rowsPerPage;
    return view.records.slice(start, start + rowsPerPage);
  }, [view.records, currentPage, rowsPerPage]);

  const handlePageChange = (newPage: number) => {
    if (newPage >= 1 && newPage <= totalPages) {
      setCurrentPage(newPage);
    }
  };

  const handleExport = () => {
    downloadFile(EXPORT_FILE_NAME, exportCsv(view.records, dataset.columns), EXPORT_MIME_TYPE);
  };

  const MultiSelect = ({ title, choices, selected, onChange }: {
    title: string,
    choices: string[],
    selected: readonly string[],
    onChange: (next: string[]) => void
  }) => (
    <fieldset className="space-y-1">
      <legend className="text-xs font-semibold uppercase text-gray-500 mb-2">{title}</legend>
      {choices.map(choice => (
        <label key={choice} className="flex items-center gap-2 text-sm text-gray-700 cursor-pointer">
          <input
            type="checkbox"
            checked={selected.includes(choice)}
            onChange={() => onChange(toggle(selected, choice))}
            className="rounded border-gray-300 text-indigo-600"
          />
          {choice}
        </label>
      ))}
    </fieldset>
  );

  const KpiCard = ({ label, value, icon }: { label: string, value: string, icon: React.ReactNode }) => (
    <div className="p-6 rounded-xl shadow-sm border bg-white border-indigo-100">
      <div className="flex items-start justify-between">
        <div>
          <p className="text-sm font-medium text-gray-500">{label}</p>
          <h3 className="text-2xl font-bold text-gray-900 mt-1">{value}</h3>
        </div>
        <div className="p-2 bg-indigo-50 rounded-lg text-indigo-600">{icon}</div>
      </div>
    </div>
  );

  const EmptyChart = () => (
    <div className="h-72 flex items-center justify-center text-sm text-gray-400">No sales for the current filters</div>
  );

  return (
    <div className="min-h-screen bg-slate-100 pb-20">
      {/* Header */}
      <header className="bg-white border-b border-gray-200 sticky top-0 z-30 shadow-sm">
        <div className="max-w-7xl mx-auto px-4 sm:px-6 lg:px-8 py-4 flex items-center justify-between">
          <div className="flex items-center gap-2">
            <BarChart3 className="w-6 h-6 text-indigo-600" />
            <h1 className="text-xl font-bold text-gray-800 tracking-tight">Global Sales Performance Dashboard</h1>
          </div>
          <div className="flex items-center gap-3">
            <span className="text-xs text-gray-400">{dataset.sourceName}</span>
            <button onClick={onReset} className="text-xs text-gray-500 hover:text-red-600 underline px-2">Load another file</button>
          </div>
        </div>
      </header>

      <div className="max-w-7xl mx-auto px-4 sm:px-6 lg:px-8 py-8 flex flex-col lg:flex-row gap-8">
        {/* Filters */}
        <aside className="lg:w-64 flex-shrink-0 bg-white rounded-xl shadow-sm border border-gray-100 p-5 space-y-6 self-start">
          <div className="flex items-center justify-between">
            <h2 className="flex items-center gap-2 font-semibold text-gray-800">
              <Filter className="w-4 h-4" /> Sales Data Filters
            </h2>
            {isFiltered && (
              <button
                onClick={() => { setCriteria(defaultCriteria(dataset)); setCurrentPage(1); }}
                className="text-gray-400 hover:text-red-500"
                title="Clear filters"
                aria-label="Clear filters"
              >
                <XCircle className="w-4 h-4" />
              </button>
            )}
          </div>

          <div className="space-y-2">
            <p className="flex items-center gap-2 text-xs font-semibold uppercase text-gray-500">
              <Calendar className="w-3.5 h-3.5" /> Reporting Period
            </p>
            <input
              type="date"
              aria-label="Start date"
              value={criteria.dateRange.start}
              min={options.dateSpan.start}
              max={options.dateSpan.end}
              onChange={(e) => e.target.value && updateCriteria({ dateRange: { ...criteria.dateRange, start: e.target.value } })}
              className="w-full text-sm border border-gray-200 rounded-md px-2 py-1"
            />
            <input
              type="date"
              aria-label="End date"
              value={criteria.dateRange.end}
              min={options.dateSpan.start}
              max={options.dateSpan.end}
              onChange={(e) => e.target.value && updateCriteria({ dateRange: { ...criteria.dateRange, end: e.target.value } })}
              className="w-full text-sm border border-gray-200 rounded-md px-2 py-1"
            />
          </div>

          <MultiSelect
            title="Country"
            choices={options.countries}
            selected={criteria.countries}
            onChange={(countries) => updateCriteria({ countries })}
          />
          <MultiSelect
            title="Product"
            choices={options.products}
            selected={criteria.products}
            onChange={(products) => updateCriteria({ products })}
          />
        </aside>

        <main className="flex-1 min-w-0 space-y-8">
          {/* KPI Cards */}
          <div className="grid grid-cols-1 md:grid-cols-3 gap-6">
            <KpiCard label="Gross Revenue" value={view.display.grossRevenue} icon={<TrendingUp className="w-6 h-6" />} />
            <KpiCard label="Net Revenue (After Discount)" value={view.display.netRevenue} icon={<Tag className="w-6 h-6" />} />
            <KpiCard label="Total Units Sold" value={view.display.totalUnits} icon={<Package className="w-6 h-6" />} />
          </div>

          <div className="grid grid-cols-1 xl:grid-cols-2 gap-8">
            <section className="bg-white p-6 rounded-xl shadow-sm border border-gray-100">
              <h2 className="flex items-center gap-2 font-semibold text-gray-800 mb-4">
                <Globe className="w-4 h-4 text-indigo-600" /> Net Revenue by Country
              </h2>
              {summary.countryTotals.length === 0 ? <EmptyChart /> : (
                <ResponsiveContainer width="100%" height={288}>
                  <BarChart data={summary.countryTotals} margin={{ top: 10, right: 10, left: 10, bottom: 0 }}>
                    <CartesianGrid strokeDasharray="3 3" vertical={false} />
                    <XAxis dataKey="name" fontSize={11} />
                    <YAxis tickFormatter={(value: number) => formatCurrency(value)} fontSize={11} width={80} />
                    <Tooltip formatter={tooltipValue} />
                    <Bar dataKey="value" name="Net Revenue" fill={BRAND_PRIMARY} radius={[4, 4, 0, 0]} />
                  </BarChart>
                </ResponsiveContainer>
              )}
            </section>

            <section className="bg-white p-6 rounded-xl shadow-sm border border-gray-100">
              <h2 className="flex items-center gap-2 font-semibold text-gray-800 mb-4">
                <ShoppingCart className="w-4 h-4 text-indigo-600" /> Product Contribution to Net Revenue
              </h2>
              {summary.productTotals.length === 0 ? <EmptyChart /> : (
                <ResponsiveContainer width="100%" height={288}>
                  <PieChart>
                    <Pie data={summary.productTotals} dataKey="value" nameKey="name" outerRadius={100} label={false}>
                      {summary.productTotals.map((entry, index) => (
                        <Cell key={entry.name} fill={COLORS[index % COLORS.length]} />
                      ))}
                    </Pie>
                    <Tooltip formatter={tooltipValue} />
                    <Legend />
                  </PieChart>
                </ResponsiveContainer>
              )}
            </section>
          </div>

          <section className="bg-white p-6 rounded-xl shadow-sm border border-gray-100">
            <h2 className="flex items-center gap-2 font-semibold text-gray-800 mb-4">
              <TrendingUp className="w-4 h-4 text-indigo-600" /> Monthly Net Revenue Trend
            </h2>
            {summary.monthlyTotals.length === 0 ? <EmptyChart /> : (
              <ResponsiveContainer width="100%" height={288}>
                <LineChart data={summary.monthlyTotals} margin={{ top: 10, right: 20, left: 10, bottom: 0 }}>
                  <CartesianGrid strokeDasharray="3 3" vertical={false} />
                  <XAxis dataKey="name" fontSize={11} />
                  <YAxis tickFormatter={(value: number) => formatCurrency(value)} fontSize={11} width={80} />
                  <Tooltip formatter={tooltipValue} />
                  <Line type="monotone" dataKey="value" name="Net Revenue" stroke={BRAND_PRIMARY} strokeWidth={2} dot={{ r: 4 }} />
                </LineChart>
              </ResponsiveContainer>
            )}
          </section>

          {/* Detail Table */}
          <section className="bg-white rounded-xl shadow-sm border border-gray-100">
            <div className="flex items-center justify-between p-6">
              <h2 className="font-semibold text-gray-800">Detailed Sales Transactions</h2>
              <button
                onClick={handleExport}
                className="flex items-center gap-2 px-3 py-1.5 rounded-md text-sm font-medium text-white bg-indigo-600 hover:bg-indigo-700"
              >
                <Download className="w-4 h-4" />
                Export Filtered Sales Report
              </button>
            </div>
            <div className="overflow-x-auto">
              <table className="w-full text-sm text-left text-gray-600">
                <thead className="text-xs text-gray-700 uppercase bg-gray-50">
                  <tr>
                    {tableColumns.map(column => (
                      <th key={column} className="px-6 py-3">{column.replace(/_/g, ' ')}</th>
                    ))}
                  </tr>
                </thead>
                <tbody>
                  {paginatedRecords.length === 0 ? (
                    <tr>
                      <td colSpan={tableColumns.length} className="px-6 py-8 text-center text-gray-400">
                        No sales match the current filters.
                      </td>
                    </tr>
                  ) : paginatedRecords.map((record, i) => (
                    <tr key={`${record.date}-${i}`} className="border-b hover:bg-gray-50">
                      {tableColumns.map(column => (
                        <td key={column} className="px-6 py-3 whitespace-nowrap">{cellText(record, column)}</td>
                      ))}
                    </tr>
                  ))}
                </tbody>
              </table>
            </div>

            {/* Pagination */}
            <div className="flex items-center justify-between px-6 py-4 text-sm text-gray-500">
              <div className="flex items-center gap-2">
                <span>Rows per page</span>
                <select
                  value={rowsPerPage}
                  onChange={(e) => { setRowsPerPage(Number(e.target.value)); setCurrentPage(1); }}
                  className="border border-gray-200 rounded-md px-2 py-1"
                >
                  {[10, 25, 50].map(n => <option key={n} value={n}>{n}</option>)}
                </select>
              </div>
              <span>{view.records.length} matching rows</span>
              <div className="flex items-center gap-2">
                <button
                  onClick={() => handlePageChange(currentPage - 1)}
                  disabled={currentPage === 1}
                  aria-label="Previous page"
                  className="p-1 rounded hover:bg-gray-100 disabled:opacity-40"
                >
                  <ChevronLeft className="w-4 h-4" />
                </button>
                <span>Page {currentPage} of {totalPages}</span>
                <button
                  onClick={() => handlePageChange(currentPage + 1)}
                  disabled={currentPage === totalPages}
                  aria-label="Next page"
                  className="p-1 rounded hover:bg-gray-100 disabled:opacity-40"
                >
                  <ChevronRight className="w-4 h-4" />
                </button>
              </div>
            </div>
          </section>
        </main>
      </div>
    </div>
  );
};

export default Dashboard;
