import React, { useState } from 'react';
import { Upload, FileSpreadsheet, Loader2, AlertCircle, CheckCircle } from 'lucide-react';
import { browserFileSource } from '../services/browserFileSource';
import { DatasetCache } from '../services/datasetCache';
import { type Dataset, DatasetLoadError } from '../types';

interface DataUploaderProps {
  cache: DatasetCache;
  onDataLoaded: (dataset: Dataset) => void;
}

export const describeLoadError = (err: unknown): string => {
  if (err instanceof DatasetLoadError) {
    switch (err.code) {
      case 'MISSING_COLUMNS':
        return `The file is missing required column(s): ${err.missingColumns.join(', ')}.`;
      case 'EMPTY_DATASET':
        return 'The file has no complete sales rows.';
      case 'SOURCE_UNREADABLE':
        return 'The file could not be read. Check that it is a valid .xlsx, .xls or .csv file.';
    }
  }
  return 'Unexpected error while processing the file.';
};

const DataUploader: React.FC<DataUploaderProps> = ({ cache, onDataLoaded }) => {
  const [isLoading, setIsLoading] = useState(false);
  const [error, setError] = useState<string | null>(null);
  const [salesFile, setSalesFile] = useState<File | null>(null);
  const [loaded, setLoaded] = useState<Dataset | null>(null);

  const handleProcess = async () => {
    if (!salesFile) {
      setError('Please choose a sales file first.');
      return;
    }

    setIsLoading(true);
    setError(null);
    setLoaded(null);

    try {
      const dataset = await cache.load(browserFileSource(salesFile));
      setLoaded(dataset);
    } catch (err) {
      console.error(err);
      setError(describeLoadError(err));
    } finally {
      setIsLoading(false);
    }
  };

  return (
    <div className="flex flex-col items-center justify-center min-h-[60vh] p-6 text-center">
      <div className="bg-white p-10 rounded-2xl shadow-xl border border-gray-100 max-w-xl w-full">
        <div className="mb-6 flex justify-center">
          <div className="bg-indigo-50 p-4 rounded-full">
            <FileSpreadsheet className="w-12 h-12 text-indigo-600" />
          </div>
        </div>

        <h2 className="text-2xl font-bold text-gray-800 mb-2">Import Sales Data</h2>
        <p className="text-gray-500 mb-8">
          Columns: Date, Country, Product, Units_Sold, Unit_Price, Total_Sale, Sales_After_Discount.
        </p>

        <label
          className={`
            flex flex-col items-center justify-center w-full h-32 mb-8
            border-2 border-dashed rounded-lg cursor-pointer transition-all duration-300
            ${salesFile ? 'border-green-300 bg-green-50' : 'border-indigo-200 bg-indigo-50 hover:bg-indigo-100'}
          `}
        >
          {salesFile ? (
            <>
              <CheckCircle className="w-8 h-8 mb-3 text-green-600" />
              <p className="mb-2 text-sm text-gray-600 font-medium px-2 break-all">{salesFile.name}</p>
            </>
          ) : (
            <>
              <Upload className="w-8 h-8 mb-3 text-indigo-600" />
              <p className="mb-2 text-sm text-gray-600">
                <span className="font-semibold">Click to choose a file</span>
              </p>
              <p className="text-xs text-gray-400">XLSX, XLS, CSV</p>
            </>
          )}
          <input
            type="file"
            accept=".xlsx, .xls, .csv"
            aria-label="Sales file"
            className="hidden"
            onChange={(e) => {
              setSalesFile(e.target.files?.[0] ?? null);
              setLoaded(null);
            }}
            disabled={isLoading}
          />
        </label>

        {error && (
          <div role="alert" className="mb-6 flex items-center gap-2 text-red-600 text-sm bg-red-50 p-3 rounded-lg text-left">
            <AlertCircle className="w-4 h-4 flex-shrink-0" />
            <span>{error}</span>
          </div>
        )}

        {loaded && (
          <div className="mb-6 flex flex-col items-center gap-1 text-green-600 text-sm bg-green-50 p-3 rounded-lg">
            <div className="flex items-center gap-2 font-bold">
              <CheckCircle className="w-4 h-4" />
              <span>Data loaded</span>
            </div>
            <div className="text-xs text-gray-600">
              {loaded.records.length} rows loaded | {loaded.droppedRows} incomplete rows skipped
            </div>
          </div>
        )}

        {loaded ? (
          <button
            onClick={() => onDataLoaded(loaded)}
            className="w-full py-3 rounded-lg font-bold text-white shadow-md bg-green-600 hover:bg-green-700"
          >
            Open Dashboard
          </button>
        ) : (
          <button
            onClick={handleProcess}
            disabled={isLoading || !salesFile}
            className={`
              w-full py-3 rounded-lg font-bold text-white shadow-md transition-all
              flex items-center justify-center gap-2
              ${isLoading || !salesFile ? 'bg-gray-400 cursor-not-allowed' : 'bg-indigo-600 hover:bg-indigo-700 hover:shadow-lg'}
            `}
          >
            {isLoading ? (
              <>
                <Loader2 className="w-5 h-5 animate-spin" />
                Processing...
              </>
            ) : (
              'Load Data'
            )}
          </button>
        )}
      </div>
    </div>
  );
};

export default DataUploader;
