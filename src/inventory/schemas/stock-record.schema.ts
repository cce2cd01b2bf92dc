import { isCategory } from '../constants/categories';
import { StockItem } from '../interface/stock-item.interface';
import { toEpochSeconds } from '../utils/format';

/**
 * Item snapshot layout: six lines per item, in this order, with no
 * separator between records. End of file ends the list.
 */
export const RECORD_FIELDS = [
  'id',
  'name',
  'category',
  'quantity',
  'lastPrice',
  'createdAt',
] as const;

export const LINES_PER_RECORD = RECORD_FIELDS.length;

export interface DecodedSnapshot {
  items: StockItem[];
  /** Index of the first record that could not be read, when decoding stopped early. */
  rejectedRecord?: number;
  reason?: string;
}

const WHOLE_NUMBER = /^\d+$/;
const SIGNED_WHOLE_NUMBER = /^-?\d+$/;

export function encodeRecord(item: StockItem): string {
  const fields = [
    item.id,
    item.name,
    item.category,
    item.quantity,
    item.lastPrice,
    toEpochSeconds(item.createdAt),
  ];
  return fields.map((field) => `${field}\n`).join('');
}

export function encodeSnapshot(items: readonly StockItem[]): string {
  return items.map(encodeRecord).join('');
}

type RecordParse =
  | { ok: true; item: StockItem }
  | { ok: false; reason: string };

function parseRecord(lines: readonly string[]): RecordParse {
  const [idLine, name, category, quantityLine, priceLine, createdLine] = lines;

  if (!WHOLE_NUMBER.test(idLine) || Number(idLine) <= 0) {
    return { ok: false, reason: `invalid id "${idLine}"` };
  }
  if (name.trim() === '') {
    return { ok: false, reason: 'empty name' };
  }
  if (!isCategory(category)) {
    return { ok: false, reason: `unknown category "${category}"` };
  }
  if (!WHOLE_NUMBER.test(quantityLine)) {
    return { ok: false, reason: `invalid quantity "${quantityLine}"` };
  }
  const lastPrice = Number(priceLine);
  if (priceLine.trim() === '' || !Number.isFinite(lastPrice) || lastPrice < 0) {
    return { ok: false, reason: `invalid price "${priceLine}"` };
  }
  if (!SIGNED_WHOLE_NUMBER.test(createdLine)) {
    return { ok: false, reason: `invalid timestamp "${createdLine}"` };
  }

  return {
    ok: true,
    item: {
      id: Number(idLine),
      name,
      category,
      quantity: Number(quantityLine),
      lastPrice,
      createdAt: new Date(Number(createdLine) * 1000),
    },
  };
}

/**
 * Reads records until the first one that is partial or malformed; the
 * records before it are kept.
 */
export function decodeSnapshot(text: string): DecodedSnapshot {
  const lines = text.split(/\r?\n/);
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }

  const items: StockItem[] = [];
  const seenIds = new Set<number>();

  for (let offset = 0; offset < lines.length; offset += LINES_PER_RECORD) {
    const recordIndex = offset / LINES_PER_RECORD;
    const chunk = lines.slice(offset, offset + LINES_PER_RECORD);

    if (chunk.length < LINES_PER_RECORD) {
      return { items, rejectedRecord: recordIndex, reason: 'partial record' };
    }

    const parsed = parseRecord(chunk);
    if (!parsed.ok) {
      return { items, rejectedRecord: recordIndex, reason: parsed.reason };
    }
    if (seenIds.has(parsed.item.id)) {
      return {
        items,
        rejectedRecord: recordIndex,
        reason: `duplicate id ${parsed.item.id}`,
      };
    }

    seenIds.add(parsed.item.id);
    items.push(parsed.item);
  }

  return { items };
}
