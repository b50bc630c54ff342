/**
 * Lifecycle of the underlying database connection
 */
export interface DatabasePort {
    connect(): Promise<void>;
    disconnect(): Promise<void>;
}
