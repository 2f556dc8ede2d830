import axios, { AxiosError, type AxiosAdapter, type AxiosResponse, type InternalAxiosRequestConfig } from "axios";

export interface StubReply {
  status: number;
  data: unknown;
}

/**
 * Axios instance whose adapter answers from a handler instead of the
 * network. A thrown AxiosError without a response simulates a dropped
 * connection.
 */
export function stubClient(handler: (config: InternalAxiosRequestConfig) => StubReply) {
  const requests: InternalAxiosRequestConfig[] = [];
  const adapter: AxiosAdapter = async (config) => {
    requests.push(config);
    const { status, data } = handler(config);
    const response: AxiosResponse = { data, status, statusText: String(status), headers: {}, config };
    if (status >= 400) {
      throw new AxiosError(`Request failed with status code ${status}`, "ERR_BAD_RESPONSE", config, null, response);
    }
    return response;
  };
  return { client: axios.create({ baseURL: "https://example.test", adapter }), requests };
}

export function networkDown(): never {
  throw new AxiosError("socket hang up", "ECONNRESET");
}
