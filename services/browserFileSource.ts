import type { DataSource } from './datasetCache';

/** An uploaded file; re-selecting an edited copy gives a new version */
export const browserFileSource = (file: File): DataSource => ({
  id: file.name,
  name: file.name,
  version: () => `${file.lastModified}:${file.size}`,
  read: () =>
    new Promise<Uint8Array>((resolve, reject) => {
      const reader = new FileReader();

      reader.onload = () => {
        const result = reader.result;
        if (result === null || typeof result === 'string') {
          reject(new Error(`Unexpected content while reading ${file.name}`));
          return;
        }
        resolve(new Uint8Array(result));
      };

      reader.onerror = () => reject(reader.error ?? new Error(`Failed to read ${file.name}`));
      reader.readAsArrayBuffer(file);
    }),
});
