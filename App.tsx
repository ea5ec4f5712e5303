import React, { useState } from 'react';
import DataUploader from './components/DataUploader';
import Dashboard from './components/Dashboard';
import { DatasetCache } from './services/datasetCache';
import type { Dataset } from './types';

const App: React.FC = () => {
  const [cache] = useState(() => new DatasetCache());
  const [dataset, setDataset] = useState<Dataset | null>(null);

  return (
    <div className="font-sans text-gray-900 bg-slate-100 min-h-screen">
      {!dataset ? (
        <main className="container mx-auto px-4 py-8">
          <div className="text-center mb-12 mt-10">
            <h1 className="text-5xl font-extrabold text-indigo-600 mb-4 tracking-tight">
              Global Sales <span className="text-gray-600 font-light">Performance</span>
            </h1>
            <p className="text-lg text-gray-600 max-w-2xl mx-auto">
              Executive-level analytics for sales performance, revenue, and trends.
            </p>
          </div>
          <DataUploader cache={cache} onDataLoaded={setDataset} />
        </main>
      ) : (
        <Dashboard dataset={dataset} onReset={() => setDataset(null)} />
      )}
    </div>
  );
};

export default App;
