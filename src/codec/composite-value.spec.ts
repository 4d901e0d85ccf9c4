import { Decimal } from 'decimal.js';
import { CompositeValue, type CodecSession } from './composite-value';
import { StructDescriptorRegistry } from './descriptor';
import { createCharacterEncoding } from './encoding';
import { InvalidValueError, UnsupportedConversionError } from './errors';
import { parseCompositeLiteral } from './literal-scanner';
import { PgTemporalParser } from './temporal';
import { Values, type Attribute } from './values';

describe('CompositeValue', () => {
  const session: CodecSession = {
    encoding: createCharacterEncoding('UTF8'),
    temporal: new PgTemporalParser(),
    calendar: { timeZone: 'utc' },
  };
  let registry: StructDescriptorRegistry;

  const define = (name: string, fields: [string, string][]) =>
    registry.define(name, fields.map(([fieldName, typeName]) => ({ name: fieldName, typeName })));

  beforeEach(() => {
    registry = new StructDescriptorRegistry();
  });

  describe('materialize', () => {
    it('should coerce attributes to their declared types', () => {
      const descriptor = define('order_line', [
        ['id', 'bigint'],
        ['qty', 'smallint'],
        ['price', 'numeric'],
        ['active', 'boolean'],
        ['code', 'character'],
        ['label', 'text'],
        ['location', 'point'],
        ['doc', 'json'],
      ]);
      const label = Values.text('hello');

      const value = CompositeValue.materialize(
        descriptor,
        [
          Values.int4(1),
          Values.int4(5),
          Values.float8(9.5),
          Values.text('t'),
          Values.text('x'),
          label,
          Values.text('(1,2)'),
          Values.text('{"a":1}'),
        ],
        session,
      );
      const [id, qty, price, active, code, labelAttr, location, doc] = value.getAttributes();

      expect(id).toEqual(Values.int8(1n));
      expect(qty).toEqual(Values.int2(5));
      expect(price?.kind === 'decimal' && price.value.equals(new Decimal('9.5'))).toBe(true);
      expect(active).toEqual(Values.bool(true));
      expect(code).toEqual(Values.char('x'));
      expect(labelAttr).toBe(label);
      expect(location).toEqual(Values.point({ x: 1, y: 2 }));
      expect(doc).toEqual(Values.object('json', '{"a":1}'));
    });

    it('should keep NULL attributes', () => {
      const descriptor = define('pair', [['left', 'integer'], ['right', 'text']]);

      expect(CompositeValue.materialize(descriptor, [null, null], session).getAttributes()).toEqual([null, null]);
    });

    it('should parse temporal attributes in the session calendar', () => {
      const descriptor = define('event', [
        ['at', 'timestamp'],
        ['on', 'date'],
        ['starts', 'time'],
      ]);

      const value = CompositeValue.materialize(
        descriptor,
        [Values.text('2024-03-05 10:20:30'), Values.text('2024-03-05'), Values.text('10:20:30')],
        session,
      );
      const [at, on, starts] = value.getAttributes();

      expect(at?.kind).toBe('timestamp');
      expect(at?.kind === 'timestamp' && at.value.toISOString()).toBe('2024-03-05T10:20:30.000Z');
      expect(on?.kind === 'date' && on.value.toISOString()).toBe('2024-03-05T00:00:00.000Z');
      expect(starts?.kind === 'time' && starts.value.toISOString()).toBe('1970-01-01T10:20:30.000Z');
    });

    it('should keep temporal values that are already parsed', () => {
      const descriptor = define('event', [['at', 'timestamp with time zone']]);
      const at = Values.timestamp(new Date(0));

      expect(CompositeValue.materialize(descriptor, [at], session).getAttributes()[0]).toBe(at);
    });

    it('should keep the raw attribute when a temporal field cannot be parsed', () => {
      const descriptor = define('event', [['at', 'timestamp']]);
      const raw = Values.text('whenever');

      expect(CompositeValue.materialize(descriptor, [raw], session).getAttributes()[0]).toBe(raw);
    });

    it('should not modify the caller array', () => {
      const descriptor = define('amount', [['value', 'bigint']]);
      const raw: Attribute[] = [Values.int4(7)];
      const original = raw[0];

      const value = CompositeValue.materialize(descriptor, raw, session);

      expect(raw[0]).toBe(original);
      expect(value.getAttributes()).not.toBe(raw);
      expect(value.getAttributes()[0]).toEqual(Values.int8(7n));
    });

    it('should freeze the attributes', () => {
      const descriptor = define('amount', [['value', 'bigint']]);
      const value = CompositeValue.materialize(descriptor, [Values.int4(7)], session);

      expect(Object.isFrozen(value.getAttributes())).toBe(true);
    });

    it('should pad missing attributes with NULL and drop extra ones', () => {
      const descriptor = define('pair', [['left', 'integer'], ['right', 'integer']]);

      expect(CompositeValue.materialize(descriptor, [Values.int4(1)], session).getAttributes()).toEqual([
        Values.int4(1),
        null,
      ]);
      expect(
        CompositeValue.materialize(descriptor, [Values.int4(1), Values.int4(2), Values.int4(3)], session).getAttributes(),
      ).toEqual([Values.int4(1), Values.int4(2)]);
    });
  });

  describe('toRecord', () => {
    it('should key attributes by field name', () => {
      const descriptor = define('pair', [['left', 'integer'], ['right', 'text']]);
      const value = CompositeValue.materialize(descriptor, [Values.int4(1), null], session);

      expect(value.sqlTypeName).toBe('pair');
      expect(value.toRecord()).toEqual({ left: Values.int4(1), right: null });
    });
  });

  describe('render', () => {
    it('should render plain attributes unquoted and NULL as an empty slot', () => {
      const descriptor = define('triple', [['a', 'text'], ['b', 'text'], ['c', 'integer']]);
      const value = CompositeValue.materialize(descriptor, [Values.text('abc'), null, Values.int4(3)], session);

      expect(value.render()).toBe('(abc,,3)');
      expect(value.toString()).toBe('(abc,,3)');
    });

    it('should quote attributes containing delimiters or whitespace', () => {
      const descriptor = define('pair', [['a', 'text'], ['b', 'text']]);
      const value = CompositeValue.materialize(descriptor, [Values.text('a,b'), Values.text('plain')], session);

      expect(value.render()).toBe('("a,b",plain)');
    });

    it('should double quotes and backslashes inside quoted attributes', () => {
      const descriptor = define('single', [['a', 'text']]);

      expect(CompositeValue.materialize(descriptor, [Values.text('say "hi"')], session).render()).toBe(
        '("say ""hi""")',
      );
      expect(CompositeValue.materialize(descriptor, [Values.text('C:\\dir')], session).render()).toBe(
        '("C:\\\\dir")',
      );
    });

    it('should render booleans in bit columns as digits', () => {
      const descriptor = define('flags', [['flag', 'bit'], ['on', 'boolean']]);
      const value = CompositeValue.materialize(descriptor, [Values.text('1'), Values.text('f')], session);

      expect(value.render()).toBe('(1,false)');
    });

    it('should decode bytes with the session encoding', () => {
      const descriptor = define('blob', [['payload', 'bytea']]);
      const bytes = new Uint8Array([0x68, 0x69, 0x20, 0x74, 0x68, 0x65, 0x72, 0x65]);

      expect(CompositeValue.materialize(descriptor, [Values.bytes(bytes)], session).render()).toBe('("hi there")');
    });

    it('should escape quotes in json attributes', () => {
      const descriptor = define('document', [['doc', 'json']]);
      const value = CompositeValue.materialize(descriptor, [Values.text('{"a":1}')], session);

      expect(value.render()).toBe('("{\\\\""a\\\\"":1}")');
    });

    it('should render a json object without a value as an empty slot', () => {
      const descriptor = define('document', [['doc', 'json'], ['n', 'integer']]);
      const value = CompositeValue.materialize(descriptor, [Values.object('json', null), Values.int4(1)], session);

      expect(value.render()).toBe('(,1)');
    });

    it('should render temporal attributes in the session calendar', () => {
      const descriptor = define('event', [['at', 'timestamp']]);
      const value = CompositeValue.materialize(
        descriptor,
        [Values.timestamp(new Date(Date.UTC(2024, 2, 5, 23, 20, 30)))],
        session,
      );

      expect(value.render()).toBe('("2024-03-05 23:20:30")');
    });

    it('should render temporal attributes as local date and time without a utc calendar', () => {
      const descriptor = define('event', [['at', 'timestamp']]);
      const value = CompositeValue.materialize(
        descriptor,
        [Values.timestamp(new Date(2024, 2, 5, 10, 20, 30))],
        { ...session, calendar: { timeZone: 'local' } },
      );

      expect(value.render()).toBe('("2024-03-05 10:20:30")');
    });

    it('should render parsed temporal text back unchanged in the utc calendar', () => {
      const descriptor = define('schedule', [['on', 'date'], ['at', 'timestamp'], ['starts', 'time']]);
      const literal = '(2024-03-05,"2024-03-05 00:20:30",23:45:00)';

      const value = CompositeValue.materialize(
        descriptor,
        parseCompositeLiteral(literal).map(token => (token === null ? null : Values.text(token))),
        session,
      );

      expect(value.render()).toBe(literal);
    });

    it('should quote nested composites', () => {
      const inner = define('inner', [['x', 'integer'], ['y', 'integer']]);
      const outer = define('outer', [['label', 'text'], ['inner', 'inner']]);
      const nested = CompositeValue.materialize(inner, [Values.int4(1), Values.int4(2)], session);

      const value = CompositeValue.materialize(outer, [Values.text('north'), Values.composite(nested)], session);

      expect(value.render()).toBe('(north,"(1,2)")');
    });

    it('should double quotes of nested composites before quoting them', () => {
      const named = define('named', [['name', 'text']]);
      const holder = define('holder', [['label', 'text'], ['item', 'named']]);
      const nested = CompositeValue.materialize(named, [Values.text('x y')], session);

      const value = CompositeValue.materialize(holder, [Values.text('box1'), Values.composite(nested)], session);

      expect(nested.render()).toBe('("x y")');
      expect(value.render()).toBe('(box1,"(""""x y"""")")');
    });

    it('should scan back to the same field text', () => {
      const descriptor = define('row', [['a', 'text'], ['b', 'integer'], ['c', 'text'], ['d', 'text']]);
      const value = CompositeValue.materialize(
        descriptor,
        [Values.text('a,b'), Values.int4(42), null, Values.text('say "hi"')],
        session,
      );

      expect(parseCompositeLiteral(value.render())).toEqual(['a,b', '42', null, 'say "hi"']);
    });
  });

  describe('attributesAs', () => {
    const ledger = () =>
      CompositeValue.materialize(
        define('ledger', [['id', 'integer'], ['amount', 'numeric'], ['label', 'text'], ['note', 'text']]),
        [Values.int4(42), Values.float8(12.5), Values.text('hello'), null],
        session,
      );

    it('should convert fields by declared type name', () => {
      const value = ledger();
      const converted = value.attributesAs(
        new Map([
          ['integer', 'long'],
          ['numeric', 'double'],
          ['text', 'string'],
        ]),
      );

      expect(converted).toEqual([Values.int8(42n), Values.float8(12.5), Values.text('hello'), null]);
      expect(converted[2]).toBe(value.getAttributes()[2]);
    });

    it('should leave unmapped fields and matching kinds untouched', () => {
      const value = ledger();
      const converted = value.attributesAs(new Map([['integer', 'integer']]));

      value.getAttributes().forEach((attribute, index) => {
        expect(converted[index]).toBe(attribute);
      });
    });

    it('should reject unsupported kinds', () => {
      expect(() => ledger().attributesAs(new Map([['text', 'uuid']]))).toThrow(UnsupportedConversionError);
      expect(() => ledger().attributesAs(new Map([['text', 'uuid']]))).toThrow('Unsupported conversion to uuid');
    });

    it('should reject text that cannot be read as the requested kind', () => {
      expect(() => ledger().attributesAs(new Map([['text', 'integer']]))).toThrow(
        new InvalidValueError('integer', 'hello'),
      );
    });

    it('should reject integer text with a huge exponent as a bad value', () => {
      const value = CompositeValue.materialize(define('reading', [['raw', 'text']]), [Values.text('1e600000000')], session);

      expect(() => value.attributesAs(new Map([['text', 'integer']]))).toThrow(
        new InvalidValueError('integer', '1e600000000'),
      );
    });

    it('should convert text to timestamps in the session calendar', () => {
      const value = CompositeValue.materialize(
        define('audit', [['at', 'text']]),
        [Values.text('2024-03-05 10:20:30')],
        session,
      );
      const [at] = value.attributesAs(new Map([['text', 'timestamp']]));

      expect(at?.kind === 'timestamp' && at.value.toISOString()).toBe('2024-03-05T10:20:30.000Z');
    });
  });

  describe('equals and hashCode', () => {
    it('should compare type name and attributes', () => {
      const pair = define('pair', [['left', 'integer'], ['right', 'integer']]);
      const other = define('other_pair', [['left', 'integer'], ['right', 'integer']]);
      const make = (descriptor: typeof pair, left: number, right: number) =>
        CompositeValue.materialize(descriptor, [Values.int4(left), Values.int4(right)], session);

      const a = make(pair, 1, 2);
      const b = make(pair, 1, 2);

      expect(a.equals(b)).toBe(true);
      expect(a.hashCode()).toBe(b.hashCode());
      expect(a.equals(make(pair, 1, 3))).toBe(false);
      expect(a.equals(make(pair, 2, 1))).toBe(false);
      expect(a.equals(make(other, 1, 2))).toBe(false);
      expect(a.equals('(1,2)')).toBe(false);
    });

    it('should compare nested composites by value', () => {
      const inner = define('inner', [['x', 'integer']]);
      const outer = define('outer', [['inner', 'inner']]);
      const wrap = (x: number) =>
        CompositeValue.materialize(
          outer,
          [Values.composite(CompositeValue.materialize(inner, [Values.int4(x)], session))],
          session,
        );

      expect(wrap(1).equals(wrap(1))).toBe(true);
      expect(wrap(1).hashCode()).toBe(wrap(1).hashCode());
      expect(wrap(1).equals(wrap(2))).toBe(false);
    });
  });
});
