export type SmsEncoding = 'GSM7' | 'UCS2';

/** SMPP data_coding values. */
export const DATA_CODING: Readonly<Record<SmsEncoding, number>> = Object.freeze({
  GSM7: 0x00,
  UCS2: 0x08,
});

/** esm_class bit announcing a user data header in short_message. */
export const ESM_CLASS_UDHI = 0x40;
export const MAX_SEGMENTS = 255;

const LIMITS: Readonly<Record<SmsEncoding, { single: number; concatenated: number }>> = {
  GSM7: { single: 160, concatenated: 153 },
  UCS2: { single: 70, concatenated: 67 },
};

const GSM7_BASIC = new Set(
  "@£$¥èéùìòÇ\nØø\rÅåΔ_ΦΓΛΩΠΨΣΘΞÆæßÉ !\"#¤%&'()*+,-./0123456789:;<=>?¡ABCDEFGHIJKLMNOPQRSTUVWXYZÄÖÑÜ§¿abcdefghijklmnopqrstuvwxyzäöñüà"
);
// Sent behind an escape septet, so each costs two.
const GSM7_EXTENSION = new Set('\f^{}\\[~]|€');

export type SmsSegment = {
  text: string;
  /** Concatenation header, null for a single-part message. */
  udh: Buffer | null;
};

export type SegmentedMessage = {
  encoding: SmsEncoding;
  dataCoding: number;
  segments: SmsSegment[];
};

export const isGsm7Encodable = (text: string): boolean =>
  [...text].every((char) => GSM7_BASIC.has(char) || GSM7_EXTENSION.has(char));

export const detectEncoding = (text: string): SmsEncoding => (isGsm7Encodable(text) ? 'GSM7' : 'UCS2');

const unitCost = (char: string, encoding: SmsEncoding): number => {
  if (encoding === 'UCS2') {
    return char.length;
  }
  return GSM7_EXTENSION.has(char) ? 2 : 1;
};

/** Splits on character boundaries so no escape pair or surrogate pair straddles two parts. */
export const splitIntoParts = (text: string, encoding: SmsEncoding): string[] => {
  const chars = [...text];
  const total = chars.reduce((sum, char) => sum + unitCost(char, encoding), 0);
  const { single, concatenated } = LIMITS[encoding];

  if (total <= single) {
    return [text];
  }

  const parts: string[] = [];
  let current = '';
  let used = 0;
  for (const char of chars) {
    const cost = unitCost(char, encoding);
    if (used + cost > concatenated) {
      parts.push(current);
      current = '';
      used = 0;
    }
    current += char;
    used += cost;
  }
  parts.push(current);
  return parts;
};

export const buildConcatenationHeader = (reference: number, total: number, sequence: number): Buffer =>
  Buffer.from([0x05, 0x00, 0x03, reference & 0xff, total, sequence]);

/**
 * Picks the narrowest encoding for the text and cuts it into SMS-sized parts, each carrying an
 * 8-bit-reference concatenation header when there is more than one.
 */
export const segmentMessage = (text: string, reference: number): SegmentedMessage => {
  const encoding = detectEncoding(text);
  const parts = splitIntoParts(text, encoding);

  return {
    encoding,
    dataCoding: DATA_CODING[encoding],
    segments: parts.map((part, index) => ({
      text: part,
      udh: parts.length > 1 ? buildConcatenationHeader(reference, parts.length, index + 1) : null,
    })),
  };
};
