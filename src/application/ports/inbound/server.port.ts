export interface ServerConfiguration {
    host: string;
    port: number;
}

/**
 * HTTP server port
 */
export interface ServerPort {
    /**
     * Dispatch a request in-process, without a listening socket
     */
    request(
        path: string,
        options?: { body?: object | string; headers?: Record<string, string>; method?: string },
    ): Promise<Response>;

    start(config: ServerConfiguration): Promise<void>;

    stop(): Promise<void>;
}
