import axios, { AxiosError, AxiosInstance, AxiosResponse, InternalAxiosRequestConfig } from 'axios';

export type StubResponse = { status: number; data: unknown };
export type StubHandler = (request: InternalAxiosRequestConfig) => StubResponse;

/**
 * Axios instance whose requests are answered in-process by `handler`.
 * Non-2xx responses reject the way axios' own adapters do.
 */
export function createStubClient(handler: StubHandler): { client: AxiosInstance; requests: InternalAxiosRequestConfig[] } {
    const requests: InternalAxiosRequestConfig[] = [];

    const client = axios.create({
        adapter: async (request: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
            requests.push(request);
            const { status, data } = handler(request);
            const response: AxiosResponse = {
                data,
                status,
                statusText: String(status),
                headers: {},
                config: request,
            };
            if (status >= 400) {
                throw new AxiosError(
                    `Request failed with status code ${status}`,
                    status >= 500 ? AxiosError.ERR_BAD_RESPONSE : AxiosError.ERR_BAD_REQUEST,
                    request,
                    undefined,
                    response
                );
            }
            return response;
        },
    });

    return { client, requests };
}
