import axios, { type AxiosInstance, type AxiosResponse } from 'axios';
import type { AppConfig } from '../config';
import { StatusError, TransportError } from '../errors';
import type { BusArrival } from '../types/bus';
import type { Logger } from '../utils/logger';
import { parseTimetable } from './parseTimetable';

type ClientConfig = Pick<AppConfig, 'baseUrl' | 'stopQueryParam' | 'userAgent'>;

export interface TimetableSource {
  getBuses(code: string): Promise<BusArrival[]>;
}

export interface TimetableClient extends TimetableSource {
  fetchPage(code: string): Promise<string>;
}

export function createTimetableClient(
  config: ClientConfig,
  logger: Logger,
  http: AxiosInstance = axios.create(),
): TimetableClient {
  async function fetchPage(code: string): Promise<string> {
    logger.debug('Fetching departures page', { url: config.baseUrl, code });

    let response: AxiosResponse<string>;
    try {
      response = await http.get<string>(config.baseUrl, {
        params: { [config.stopQueryParam]: code },
        headers: { 'User-Agent': config.userAgent },
        responseType: 'text',
        // Status handling is ours, axios only reports transport failures.
        validateStatus: () => true,
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new TransportError(`unable to reach ${config.baseUrl}: ${message}`, error);
    }

    if (response.status !== 200) {
      throw new StatusError(response.status, response.statusText);
    }
    return response.data;
  }

  async function getBuses(code: string): Promise<BusArrival[]> {
    const html = await fetchPage(code);
    return parseTimetable(html);
  }

  return { fetchPage, getBuses };
}
