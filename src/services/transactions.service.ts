import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import logger from '../utils/logger';
import { TransientFetchError, errorMessage } from '../utils/errors';
import { formatHostDateTime } from '../utils/datetime';
import type { PunchRecord, SyncConfiguration } from '../types/sync';

export const TRANSACTIONS_PATH = '/iclock/api/transactions/';
export const MAX_PAGES = 100;

const HTTPS_PORTS = [443, 8443];

const rawTransactionSchema = z.record(z.unknown());
const rawListSchema = z.array(rawTransactionSchema);
const nextSchema = z.string().min(1).nullish().catch(null);

type RawTransaction = z.infer<typeof rawTransactionSchema>;

/**
 * Known response envelopes of the transactions endpoint.
 */
export type TransactionsPage =
    | { kind: 'data'; records: RawTransaction[]; next: string | null }
    | { kind: 'results'; records: RawTransaction[]; next: string | null }
    | { kind: 'transactions'; records: RawTransaction[]; next: string | null }
    | { kind: 'list'; records: RawTransaction[]; next: null }
    | { kind: 'unknown'; records: RawTransaction[]; next: string | null };

const envelopeKeys = ['data', 'results', 'transactions'] as const;

export function decodeTransactionsPage(body: unknown): TransactionsPage {
    const list = rawListSchema.safeParse(body);
    if (list.success) {
        return { kind: 'list', records: list.data, next: null };
    }

    const envelope = rawTransactionSchema.safeParse(body);
    if (!envelope.success) {
        return { kind: 'unknown', records: [], next: null };
    }

    const next = nextSchema.parse(envelope.data.next) ?? null;
    for (const key of envelopeKeys) {
        if (key in envelope.data) {
            const records = rawListSchema.safeParse(envelope.data[key]);
            if (records.success) {
                return { kind: key, records: records.data, next };
            }
            return { kind: 'unknown', records: [], next };
        }
    }

    return { kind: 'unknown', records: [], next };
}

export function buildBaseUrl(serverIp: string, serverPort: number): string {
    const protocol = HTTPS_PORTS.includes(serverPort) ? 'https' : 'http';
    return `${protocol}://${serverIp}:${serverPort}`;
}

function optionalString(value: unknown): string | null {
    if (typeof value === 'string' && value !== '') {
        return value;
    }
    if (typeof value === 'number' && value !== 0) {
        return String(value);
    }
    return null;
}

export function toPunchRecord(raw: RawTransaction): PunchRecord {
    const punchTime = raw.punch_time;
    return {
        subjectCode: optionalString(raw.emp_code),
        punchTime: typeof punchTime === 'string' && punchTime !== '' ? punchTime : null,
        hints: {
            punch_state: raw.punch_state,
            punch_state_display: raw.punch_state_display,
            log_type: raw.log_type,
        },
        origin: {
            kind: 'api',
            deviceAlias: optionalString(raw.terminal_alias) ?? optionalString(raw.terminal_sn),
            sourceId: optionalString(raw.id),
        },
    };
}

export interface TransactionsFetch {
    records: PunchRecord[];
    /** Set when a page failed; `records` then holds what came before it */
    error: TransientFetchError | null;
}

/**
 * Client for the vendor's paginated transactions API
 */
export class TransactionsService {
    private client: AxiosInstance;

    constructor(client?: AxiosInstance) {
        this.client =
            client ??
            axios.create({
                timeout: 30000,
                headers: {
                    'Content-Type': 'application/json',
                },
            });
    }

    /**
     * Fetch every punch in [start, end], following `next` links.
     * A failed page ends pagination; records fetched before it are returned
     * together with the failure.
     */
    async fetchTransactions(
        settings: Pick<SyncConfiguration, 'serverIp' | 'serverPort' | 'token'>,
        start: Date,
        end: Date
    ): Promise<TransactionsFetch> {
        const records: RawTransaction[] = [];
        const baseURL = buildBaseUrl(settings.serverIp ?? '', settings.serverPort);
        const headers = { Authorization: `Bearer ${settings.token ?? ''}` };
        let url: string | null = TRANSACTIONS_PATH;
        let page = 0;
        let error: TransientFetchError | null = null;

        try {
            while (url && page < MAX_PAGES) {
                // Only the first page carries the range; `next` links embed it
                const response: { data: unknown } = await this.client.get(url, {
                    baseURL,
                    headers,
                    params:
                        page === 0
                            ? { start_time: formatHostDateTime(start), end_time: formatHostDateTime(end) }
                            : undefined,
                });

                const decoded = decodeTransactionsPage(response.data);
                records.push(...decoded.records);
                url = decoded.next;
                page++;

                if (page > 1) {
                    logger.info(`[FETCH] Fetched page ${page}, total transactions so far: ${records.length}`);
                }
            }

            if (url) {
                logger.warn(`[FETCH] Stopped after ${MAX_PAGES} pages`, { next: url });
            }
        } catch (cause) {
            error = new TransientFetchError(errorMessage(cause), page + 1, records.length);
            logger.error('[FETCH] Failed to fetch transactions', {
                error: error.message,
                page: error.page,
                keptRecords: error.fetched,
            });
        }

        if (records.length > 0) {
            logger.info(`[FETCH] Fetched ${records.length} transactions from ${page} page(s)`);
        }

        return { records: records.map(toPunchRecord), error };
    }
}

export default new TransactionsService();
