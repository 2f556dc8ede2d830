import axios, { type AxiosInstance, type CreateAxiosDefaults } from "axios";
import type { z } from "zod";
import { TransientSourceError, ValidationError } from "../../_core/errors";
import type { SourceName } from "../../sync/types";

export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";

export function createSourceClient(config: CreateAxiosDefaults): AxiosInstance {
  return axios.create({
    timeout: 30_000,
    ...config,
    headers: { "User-Agent": DEFAULT_USER_AGENT, ...config.headers },
  });
}

/**
 * Network failures, timeouts, 429 and 5xx are worth retrying; any other
 * HTTP error is the request's fault and is rethrown as is. Cancellation
 * passes through untouched so the caller sees its own abort reason.
 */
export function toSourceError(source: SourceName, error: unknown): unknown {
  if (axios.isCancel(error) || !axios.isAxiosError(error)) return error;

  const status = error.response?.status;
  if (status === undefined) {
    return new TransientSourceError(source, `Network error: ${error.code ?? error.message}`, undefined, { cause: error });
  }
  if (status === 429 || status >= 500) {
    return new TransientSourceError(source, `HTTP ${status} from ${error.config?.url ?? "upstream"}`, status, { cause: error });
  }
  return error;
}

export async function getJson<T>(
  client: AxiosInstance,
  source: SourceName,
  url: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  options: { params?: Record<string, string | number>; signal?: AbortSignal } = {},
): Promise<T> {
  let data: unknown;
  try {
    const response = await client.get<unknown>(url, { params: options.params, signal: options.signal });
    data = response.data;
  } catch (error) {
    throw toSourceError(source, error);
  }

  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => ({ path: i.path.join("."), message: i.message }));
    throw new ValidationError(`[${source}] Unexpected response shape from ${url}`, issues);
  }
  return parsed.data;
}

export async function getText(
  client: AxiosInstance,
  source: SourceName,
  url: string,
  options: { signal?: AbortSignal } = {},
): Promise<string> {
  try {
    const response = await client.get<string>(url, { responseType: "text", signal: options.signal });
    return String(response.data);
  } catch (error) {
    throw toSourceError(source, error);
  }
}
