import axios from 'axios';
import { RemoteError } from '@/utils/errors';

/** Pull a message out of an error body such as `{ "message": "..." }` */
function readErrorBody(data: unknown): string | undefined {
  if (typeof data === 'string' && data.trim()) {
    return data.trim();
  }
  if (data && typeof data === 'object') {
    for (const key of ['message', 'Message', 'detail', 'error']) {
      const value: unknown = Reflect.get(data, key);
      if (typeof value === 'string' && value.trim()) {
        return value.trim();
      }
    }
  }
  return undefined;
}

/**
 * Rephrase common failures; anything else passes through verbatim.
 */
export function describeRemoteFailure(status: number | undefined, detail: string | undefined): string {
  switch (status) {
    case 401:
    case 403:
      return `Not authorized to invoke the model${detail ? `: ${detail}` : '.'}`;
    case 429:
      return `Request quota exceeded, please wait and try again${detail ? ` (${detail})` : '.'}`;
    default:
      if (detail) return detail;
      return status ? `Model request failed with HTTP ${status}` : 'Model request failed';
  }
}

/** Axios instance for the inference endpoint; base URL is set per call */
const api = axios.create({
  headers: {
    'Content-Type': 'application/json',
    Accept: 'application/json',
  },
});

// Response interceptor: every transport failure becomes a RemoteError
api.interceptors.response.use(
  (response) => response,
  (error: unknown) => {
    if (!axios.isAxiosError(error)) {
      return Promise.reject(error);
    }
    const status = error.response?.status;
    const detail = readErrorBody(error.response?.data);
    const message =
      error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT'
        ? 'The model request timed out'
        : describeRemoteFailure(status, detail ?? (status ? undefined : error.message));
    console.error('[API Error]', message);
    return Promise.reject(new RemoteError(message, status));
  },
);

export default api;
