/**
 * Transport layer types
 * The session consumes an ordered, reliable byte stream; retransmission is the transport's job.
 */

export interface Transport {
  write(data: Uint8Array): Promise<void>;
  /**
   * Next chunk of bytes, or null once the peer has closed the stream.
   * Chunk boundaries carry no meaning.
   */
  read(): Promise<Uint8Array | null>;
  close(): Promise<void>;
}

export interface TransportOptions {
  host?: string;
  port: number;
  /** Connect timeout (ms) */
  timeout?: number;
}
