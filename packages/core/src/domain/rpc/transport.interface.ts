/**
 * @fileoverview Transport - Frame Exchange Contract
 *
 * @packageDocumentation
 * @module @threadline/core/domain/rpc
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * Clients write request frames to a transport and read reply frames back.
 * Servers accept request frames and produce reply frames. What moves the
 * bytes (a socket, a queue, an in-process hand-off) is an adapter concern.
 */

/**
 * Client side of a connection.
 */
export interface ITransport {
  /**
   * Send one request frame and resolve with its reply frame.
   *
   * @throws WriteError if the frame could not be sent
   * @throws TransportClosedError after {@link close}
   */
  dispatch(frame: Buffer): Promise<Buffer>;

  close(): Promise<void>;
}

/**
 * Server side of a connection.
 */
export interface IFrameHandler {
  /** Handle one request frame. Never rejects; failures become error replies. */
  receive(frame: Buffer): Promise<Buffer>;
}
