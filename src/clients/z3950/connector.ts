// ---------------------------------------------------------------------------
// Boundary to a native Z39.50 toolkit (YAZ/ZOOM or similar).
//
// The toolkit is not part of this package: applications supply a
// Z3950Connector backed by whichever binding they run.
// ---------------------------------------------------------------------------

export interface Z3950ConnectionOptions {
  host: string;
  port: number;
  databaseName: string;
  preferredRecordSyntax: string;
}

/** Hits of one PQF query. */
export interface Z3950ResultSet {
  readonly size: number;
  /** MARCXML rendering of the hit at 0-based `index`. */
  record(index: number): Promise<string>;
}

/** An open session with a Z39.50 server. */
export interface Z3950Connection {
  /** Run a query in Prefix Query Format, e.g. `@attr 1=12 000862960`. */
  search(pqf: string): Promise<Z3950ResultSet>;
  close(): Promise<void>;
}

export interface Z3950Connector {
  connect(options: Z3950ConnectionOptions): Promise<Z3950Connection>;
}
