/**
 * Pipeline Data Source Contracts
 *
 * A data source hands out connections and takes them back. The check engine
 * borrows one connection per check and always returns it; pool construction
 * and driver settings stay with whoever built the data source.
 */

export type QueryRow = Record<string, unknown>;

export interface PipelineConnection {
  query(sql: string, params?: unknown[]): Promise<QueryRow[]>;
}

export interface PipelineDataSource {
  /** Label used in diagnostics, e.g. `source` or a masked connection string */
  readonly name: string;
  acquire(): Promise<PipelineConnection>;
  release(connection: PipelineConnection): Promise<void>;
  /** Ends the underlying pool; the engine never calls this */
  close?(): Promise<void>;
}
