export interface JobResult {
  success: boolean;
  data?: unknown;
  error?: string;
  metadata: Record<string, string>;
}

export const JobResult = {
  success(data?: unknown): JobResult {
    return { success: true, data, metadata: {} };
  },

  failure(error: string): JobResult {
    return { success: false, error, metadata: {} };
  },

  withMetadata(result: JobResult, key: string, value: string): JobResult {
    return { ...result, metadata: { ...result.metadata, [key]: value } };
  },
};
