import type { DeliveryReceipt } from '@sms-gateway/contracts';

/** The parts of an inbound deliver_sm the channel reads. */
export type InboundDeliverSm = {
  esmClass: number;
  sourceAddress: string;
  shortMessage: string;
  receiptedMessageId: string | null;
};

const MESSAGE_TYPE_MASK = 0x3c;
const SMSC_DELIVERY_RECEIPT = 0x04;

export const isDeliveryReceipt = (pdu: InboundDeliverSm): boolean =>
  (pdu.esmClass & MESSAGE_TYPE_MASK) === SMSC_DELIVERY_RECEIPT;

export type ReceiptTextFields = {
  id: string | null;
  stat: string;
  err: number | null;
};

/** Reads the `id:` `stat:` and `err:` fields of the conventional SMSC receipt text. */
export const parseReceiptText = (text: string): ReceiptTextFields => {
  const id = /\bid:(\S+)/i.exec(text)?.[1] ?? null;
  const stat = /\bstat:(\S+)/i.exec(text)?.[1]?.toUpperCase() ?? 'UNKNOWN';
  const err = /\berr:(\d+)/i.exec(text)?.[1];

  return { id, stat, err: err !== undefined ? Number.parseInt(err, 10) : null };
};

/**
 * Turns a receipt deliver_sm into a DeliveryReceipt. The receipted_message_id TLV wins over the id in
 * the text; a receipt with neither is dropped.
 */
export const toDeliveryReceipt = (pdu: InboundDeliverSm, receivedAt: Date): DeliveryReceipt | null => {
  const fields = parseReceiptText(pdu.shortMessage);
  const providerMessageId = pdu.receiptedMessageId ?? fields.id;
  if (!providerMessageId) {
    return null;
  }

  return {
    providerMessageId,
    status: fields.stat,
    errorCode: fields.err,
    receivedAt,
    receiptText: pdu.shortMessage,
  };
};
