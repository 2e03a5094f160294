/**
 * End-to-end test: decode IPv4 headers from hex fixtures with the layout
 * used by the command-line decoder.
 */
import * as fs from 'fs';
import * as path from 'path';
import { LengthMismatchError, hexToBytes } from '../../src';
import { ipv4Header } from '../../cli/layouts/ipv4Header';

function loadHexFixture(name: string): Uint8Array {
  return hexToBytes(fs.readFileSync(path.join(__dirname, '..', 'fixtures', name), 'utf-8'));
}

describe('IPv4 header fixture decode', () => {
  it('decodes a header without options', () => {
    const bytes = loadHexFixture('ipv4_header.hex');
    const header = ipv4Header();
    header.decode(bytes);

    expect(header.get('first.version')).toBe(4);
    expect(header.get('first.ihl')).toBe(5);
    expect(header.get('tos')).toBe(0);
    expect(header.get('totalLength')).toBe(60);
    expect(header.get('identification')).toBe(0x1234);
    expect(header.get('fragment.reserved')).toBe(false);
    expect(header.get('fragment.dontFragment')).toBe(true);
    expect(header.get('fragment.moreFragments')).toBe(false);
    expect(header.get('fragment.offset')).toBe(0);
    expect(header.get('ttl')).toBe(64);
    expect(header.get('protocol')).toBe(6);
    expect(header.get('source')).toBe(0x0a000001);
    expect(header.get('destination')).toBe(0x0a000002);
    expect(header.get('options')).toEqual(new Uint8Array(0));
    expect(header.size()).toBe(20);
    expect(header.encode()).toEqual(bytes);
  });

  it('sizes the options from the header length', () => {
    const bytes = loadHexFixture('ipv4_header_options.hex');
    const header = ipv4Header();
    header.decode(bytes);

    expect(header.get('first.ihl')).toBe(6);
    expect(header.get('ttl')).toBe(32);
    expect(header.get('protocol')).toBe(17);
    expect(header.get('source')).toBe(0xc0a80001);
    expect(header.field('options').strValue()).toBe('0x01010100');
    expect(header.size()).toBe(24);
    expect(header.encode()).toEqual(bytes);
  });

  it('renders every leaf for display', () => {
    const header = ipv4Header();
    header.decode(loadHexFixture('ipv4_header.hex'));
    const lines = header.keys().map(key => `${key} = ${header.field(key).strValue()}`);
    expect(lines.slice(0, 5)).toEqual([
      'first.version = 0x04',
      'first.ihl = 0x05',
      'tos = 0',
      'totalLength = 60',
      'identification = 4660',
    ]);
    expect(lines).toContain('fragment.dontFragment = True');
    expect(lines).toContain('fragment.offset = 0x0000');
    expect(lines[lines.length - 1]).toBe('options = ');
  });

  it('builds a header from values', () => {
    const header = ipv4Header();
    header.set('totalLength', 20);
    header.set('ttl', 1);
    header.set('protocol', 1);
    header.set('source', 0x7f000001);
    header.set('destination', 0x7f000001);
    expect(header.encode()).toEqual(
      Uint8Array.of(0x45, 0, 0, 20, 0, 0, 0, 0, 1, 1, 0, 0, 127, 0, 0, 1, 127, 0, 0, 1),
    );
  });

  it('requires options to match the header length', () => {
    const header = ipv4Header();
    header.set('first.ihl', 6);
    expect(() => header.encode()).toThrow(LengthMismatchError);
    expect(() => header.encode()).toThrow("Length mismatch in 'options' (4 expected, 0 given)");
  });
});
