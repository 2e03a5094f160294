import {
  BitField,
  BitStructure,
  BooleanField,
  Structure,
  StringField,
  UInt8,
  UInt16,
  UInt32,
} from '../../src';

/** Header length in 32-bit words when there are no options. */
export const IPV4_MIN_IHL = 5;

/**
 * IPv4 header (RFC 791), to be used as the root of a decode. The options run
 * is sized from the header length decoded in the first byte.
 */
export function ipv4Header(name = 'ipv4'): Structure {
  const header = new Structure(name);

  const first = new BitStructure('first');
  first.append(new BitField('version', 4, 4));
  first.append(new BitField('ihl', 4, IPV4_MIN_IHL));
  header.append(first);

  header.append(new UInt8('tos'));
  header.append(new UInt16('totalLength'));
  header.append(new UInt16('identification'));

  const fragment = new BitStructure('fragment');
  fragment.append(new BooleanField('reserved'));
  fragment.append(new BooleanField('dontFragment'));
  fragment.append(new BooleanField('moreFragments'));
  fragment.append(new BitField('offset', 13));
  header.append(fragment);

  header.append(new UInt8('ttl'));
  header.append(new UInt8('protocol'));
  header.append(new UInt16('checksum'));
  header.append(new UInt32('source'));
  header.append(new UInt32('destination'));
  header.append(
    new StringField('options', {
      length: ctx => (ctx.numberAt('first.ihl') - IPV4_MIN_IHL) * 4,
    }),
  );

  return header;
}
