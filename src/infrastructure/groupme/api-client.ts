import type { z } from 'zod';

import { createBaseError } from '../../shared/errors/base-error';
import { formatIssuePath } from '../../shared/errors/issue-path';
import { logger } from '../logging/logger';

export type QueryValue = string | number | null | undefined;
export type QueryParams = ReadonlyArray<readonly [string, QueryValue]>;

export interface ApiClientOptions {
  baseUrl: string;
  apiToken: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

export interface ApiClient {
  /**
   * 304 Not Modified の場合は null を返す
   */
  get<S extends z.ZodTypeAny>(
    path: string,
    query: QueryParams,
    schema: S
  ): Promise<z.output<S> | null>;
  download(url: string): Promise<Uint8Array>;
}

/**
 * GroupMe REST API のクライアントを作成する
 * トークンはクエリパラメータの末尾に付与する
 */
export function createApiClient(options: ApiClientOptions): ApiClient {
  const fetchImpl = options.fetchImpl ?? fetch;
  const timeoutMs = options.timeoutMs ?? 30000;
  const baseUrl = options.baseUrl.replace(/\/+$/, '');

  const buildQuery = (query: QueryParams): URLSearchParams => {
    const params = new URLSearchParams();
    for (const [key, value] of query) {
      if (value === null || value === undefined) continue;
      params.append(key, String(value));
    }
    return params;
  };

  /**
   * リクエストを送信する。通信エラーとタイムアウトは TRANSPORT_ERROR にする
   */
  const send = async (url: string, label: string): Promise<Response> => {
    try {
      return await fetchImpl(url, { signal: AbortSignal.timeout(timeoutMs) });
    } catch (error) {
      throw createBaseError(`リクエストに失敗しました: ${label}`, 'TRANSPORT_ERROR', {
        url: label,
        error,
      });
    }
  };

  const get = async <S extends z.ZodTypeAny>(
    path: string,
    query: QueryParams,
    schema: S
  ): Promise<z.output<S> | null> => {
    const params = buildQuery(query);
    const publicQuery = params.toString();
    // ログ用にはトークンを含めない
    const label = publicQuery ? `GET ${path}?${publicQuery}` : `GET ${path}`;
    params.append('token', options.apiToken);

    logger.debug(label);
    const response = await send(`${baseUrl}${path}?${params.toString()}`, label);

    if (response.status === 304) {
      return null;
    }

    if (!response.ok) {
      throw createBaseError(
        `API がエラーを返しました (HTTP ${response.status}): ${label}`,
        'TRANSPORT_ERROR',
        { url: label, status: response.status }
      );
    }

    let body: string;
    try {
      body = await response.text();
    } catch (error) {
      throw createBaseError(`レスポンスの受信に失敗しました: ${label}`, 'TRANSPORT_ERROR', {
        url: label,
        error,
      });
    }

    let json: unknown;
    try {
      json = JSON.parse(body);
    } catch (error) {
      throw createBaseError(`レスポンスが JSON ではありません: ${label}`, 'DECODE_ERROR', {
        url: label,
        path: '(root)',
        error,
      });
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const issuePath = formatIssuePath(issue?.path ?? []);
      throw createBaseError(
        `レスポンスのデコードに失敗しました (${issuePath}): ${issue?.message ?? 'invalid'}`,
        'DECODE_ERROR',
        { url: label, path: issuePath }
      );
    }

    return parsed.data;
  };

  /**
   * メディアファイルをダウンロードする（認証なし）
   */
  const download = async (url: string): Promise<Uint8Array> => {
    const response = await send(url, `GET ${url}`);

    if (!response.ok) {
      throw createBaseError(
        `ファイルのダウンロードに失敗しました (HTTP ${response.status}): ${url}`,
        'TRANSPORT_ERROR',
        { url, status: response.status }
      );
    }

    try {
      return new Uint8Array(await response.arrayBuffer());
    } catch (error) {
      throw createBaseError(`ファイルの受信に失敗しました: ${url}`, 'TRANSPORT_ERROR', {
        url,
        error,
      });
    }
  };

  return { get, download };
}
