// The smpp package ships plain JavaScript; these are the parts of its API the SMPP channel calls.
declare module 'smpp' {
  import type { EventEmitter } from 'node:events';

  export type PduFields = Record<string, unknown>;

  export interface PDU {
    readonly command: string;
    readonly command_status: number;
    readonly message_id?: string;
    readonly esm_class?: number;
    readonly source_addr?: string;
    readonly short_message?: { message?: string | Buffer } | string | Buffer;
    readonly receipted_message_id?: string;
    response(fields?: PduFields): PDU;
  }

  export type PduCallback = (pdu: PDU) => void;

  export interface ConnectOptions {
    url: string;
    auto_enquire_link_period?: number;
    connectTimeout?: number;
  }

  export interface Session extends EventEmitter {
    bind_transceiver(fields: PduFields, callback?: PduCallback): void;
    submit_sm(fields: PduFields, callback?: PduCallback): void;
    enquire_link(fields?: PduFields, callback?: PduCallback): void;
    unbind(fields?: PduFields, callback?: PduCallback): void;
    send(pdu: PDU, callback?: PduCallback): boolean;
    close(callback?: () => void): void;
    destroy(callback?: () => void): void;
  }

  const smpp: {
    connect(options: ConnectOptions, listener?: () => void): Session;
    readonly ESME_ROK: number;
  };

  export default smpp;
}
