import { ByteCursor } from '../ByteCursor';
import { ByteWriter } from '../ByteWriter';
import type { ListValue, Value } from '../Value';
import { Codec } from './Codec';
import { captureMeta, DecodedList, DecodedNode } from './DecodedNode';
import { BYTE_END, BYTE_LIST, expectMarker, readContainerEnd } from '../helpers';

export interface ListCodecOptions {
  /** Codec for each element of the list. */
  itemCodec: Codec<Value>;
}

/**
 * List codec: `l<value>*e`.
 * Elements are encoded back to back in their original order.
 */
export class ListCodec implements Codec<ListValue, DecodedList> {
  private readonly itemCodec: Codec<Value>;

  constructor(options: ListCodecOptions) {
    this.itemCodec = options.itemCodec;
  }

  encode(writer: ByteWriter, value: ListValue): void {
    writer.writeByte(BYTE_LIST);
    for (const item of value.items) {
      this.itemCodec.encode(writer, item);
    }
    writer.writeByte(BYTE_END);
  }

  decode(cursor: ByteCursor): ListValue {
    const offset = expectMarker(cursor, BYTE_LIST, 'a list');
    cursor.enter(offset);
    const items: Value[] = [];
    while (!readContainerEnd(cursor, offset, items.length, 'list')) {
      items.push(this.itemCodec.decode(cursor));
    }
    cursor.leave();
    return { kind: 'list', items };
  }

  decodeWithMetadata(cursor: ByteCursor): DecodedList {
    const offset = expectMarker(cursor, BYTE_LIST, 'a list');
    cursor.enter(offset);
    const items: DecodedNode[] = [];
    while (!readContainerEnd(cursor, offset, items.length, 'list')) {
      items.push(this.itemCodec.decodeWithMetadata(cursor));
    }
    cursor.leave();
    return { kind: 'list', value: items, meta: captureMeta(cursor, offset) };
  }
}
