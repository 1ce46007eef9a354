export type DocumentProcessingConfig = {
  maxFileSizeMb: number;
  maxFilesPerBatch: number;
  batchMaxWorkers: number; // Per-batch OCR/upload concurrency ceiling
  gcp: {
    projectId: string;
    documentAi: {
      location: string;
      processorId: string;
    };
    storage: {
      bucket: string;
      rawPrefix: string;
    };
  };
};
