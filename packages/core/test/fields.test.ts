import { describe, expect, it } from 'vitest';
import { FieldConfigurationError, StopValidation, ValidationError } from '../src/errors.js';
import { DateField, DateTimeField, TimeField } from '../src/fields/datetime.js';
import {
  BooleanField,
  FloatField,
  IntegerField,
  parseFloatValue,
  parseInteger,
  StringField,
} from '../src/fields/simple.js';
import { UnboundField } from '../src/fields/unbound-field.js';
import type { BaseJson } from '../src/json/base-json.js';
import { Json } from '../src/json/json.js';
import { DefaultMeta } from '../src/meta.js';
import { DataRequired, Length } from '../src/validators/validators.js';

function toInteger(value: unknown): number {
  const parsed = parseInteger(value);
  if (parsed === null) {
    throw new ValidationError('Not an integer');
  }
  return parsed;
}

describe('defaults', () => {
  it('should use a plain default value', () => {
    const field = StringField.unbound({ default: 42 }).bind(new Json(), { name: 'a' });
    field.process(null);
    expect(field.data).toBe(42);
  });

  it('should call a function default on each process', () => {
    let calls = 0;
    const field = StringField.unbound({ default: () => ++calls }).bind(new Json(), { name: 'a' });
    field.process(null);
    expect(field.data).toBe(1);
    field.process(null);
    expect(field.data).toBe(2);
  });
});

describe('Flags', () => {
  function flagsOf() {
    return StringField.unbound({ validators: [new DataRequired()] }).bind(new Json(), { name: 'a' })
      .flags;
  }

  it('should expose flags set by validators', () => {
    const flags = flagsOf();
    expect(flags.get('required')).toBe(true);
    expect(flags.has('required')).toBe(true);
    expect(flags.get('optional')).toBe(false);
    expect(flags.has('optional')).toBe(false);
  });

  it('should allow assignment', () => {
    const flags = flagsOf();
    flags.set('optional');
    expect(flags.get('optional')).toBe(true);
    expect(flags.has('optional')).toBe(true);
  });

  it('should unset a flag', () => {
    const flags = flagsOf();
    flags.set('required', false);
    expect(flags.get('required')).toBe(false);
    expect(flags.has('required')).toBe(false);
    expect(flags.names()).toEqual([]);
  });

  it('should list set flags in its string form', () => {
    expect(flagsOf().toString()).toBe('<Flags: {required}>');
  });
});

describe('filters', () => {
  class F extends Json {
    static fields = {
      a: StringField.unbound({
        default: '  hello',
        filters: [(value: unknown) => String(value).trim()],
      }),
      b: StringField.unbound({
        default: '42',
        filters: [toInteger, (value: unknown) => -Number(value)],
      }),
    };
  }

  it('should run filters over the processed data', () => {
    const json = new F();
    expect(json.get('a').data).toBe('hello');
    expect(json.get('b').data).toBe(-42);
    expect(json.validate()).toBe(true);
  });

  it('should record a failing filter as a process error', () => {
    const json = new F({ a: '  foo bar  ', b: 'hi' });
    expect(json.get('a').data).toBe('foo bar');
    expect(json.get('b').data).toBe('hi');
    expect(json.get('b').processErrors).toEqual(['Not an integer']);
    expect(json.validate()).toBe(false);
  });
});

describe('Field', () => {
  class F extends Json {
    static fields = {
      a: StringField.unbound({ default: 'hello' }),
    };
  }

  it('should describe its unbound declaration', () => {
    const unbound = F.fields.a;
    expect(unbound).toBeInstanceOf(UnboundField);
    expect(unbound.creationCounter).toBeGreaterThan(0);
    expect(unbound.fieldClass).toBe(StringField);
    expect(unbound.args).toEqual([{ default: 'hello' }]);
    expect(unbound.toString()).toBe('<UnboundField(StringField, {default})>');
  });

  it('should give later declarations a higher creation counter', () => {
    const first = StringField.unbound();
    const second = IntegerField.unbound();
    expect(second.creationCounter).toBeGreaterThan(first.creationCounter);
  });

  it('should coerce to a string through its value', () => {
    const field = new F().get('a');
    expect(field.value()).toBe('hello');
    expect(field.toString()).toBe('hello');
    expect(`${field}`).toBe('hello');
  });

  it('should carry its name, id and type', () => {
    const field = new F().get('a');
    expect(field.name).toBe('a');
    expect(field.shortName).toBe('a');
    expect(field.id).toBe('a');
    expect(field.type).toBe('StringField');
  });

  it('should take an explicit id', () => {
    const field = StringField.unbound({ id: 'custom' }).bind(new Json(), { name: 'a' });
    expect(field.id).toBe('custom');
  });

  it('should share the container meta', () => {
    const json = new F();
    expect(json.get('a').meta).toBe(json.meta);
  });

  it('should bind with an explicit meta and no container', () => {
    const meta = new DefaultMeta();
    const field = StringField.unbound().bind(null, { name: 'foo', meta });
    expect(field.meta).toBe(meta);
  });

  it('should refuse to bind without a container or meta', () => {
    expect(() => StringField.unbound().bind(null, { name: 'foo' })).toThrow(FieldConfigurationError);
  });
});

describe('pre and post validation', () => {
  class PrePostField extends StringField {
    override preValidate(): void {
      const data = String(this.data);
      if (data === 'stoponly') {
        throw new StopValidation();
      } else if (data.startsWith('stop')) {
        throw new StopValidation('stop with message');
      } else if (data === 'v') {
        throw new ValidationError('value error');
      }
    }

    override postValidate(_json: BaseJson, stopped: boolean): void {
      if (this.data === 'p') {
        throw new ValidationError('Post');
      } else if (stopped && this.data === 'stop-post') {
        throw new ValidationError('Post-stopped');
      }
    }
  }

  class F extends Json {
    static fields = {
      a: PrePostField.unbound({ validators: [new Length({ max: 1, message: 'too long' })] }),
    };
  }

  function validated(value: string) {
    const json = new F(null, { data: { a: value } });
    json.validate();
    return json.get('a');
  }

  it('should stop the chain from preValidate', () => {
    expect(validated('long').errors).toEqual(['too long']);
    expect(validated('stoponly').errors).toEqual([]);
    expect(validated('stopmessage').errors).toEqual(['stop with message']);
    expect(validated('v').errors).toEqual(['value error']);
  });

  it('should run postValidate after the chain', () => {
    expect(validated('p').errors).toEqual(['Post']);
    expect(validated('stop-post').errors).toEqual(['stop with message', 'Post-stopped']);
  });
});

describe('StringField', () => {
  class F extends Json {
    static fields = { a: StringField.unbound() };
  }

  it('should keep null data without input', () => {
    const json = new F();
    expect(json.get('a').data).toBeNull();
    expect(json.get('a').value()).toBeNull();
  });

  it('should take a string from the input', () => {
    expect(new F({ a: 'hello' }).get('a').data).toBe('hello');
    expect(new F({ a: '你好' }).get('a').value()).toBe('你好');
  });

  it('should use the empty string when the key is missing', () => {
    expect(new F({ b: 'hello' }).get('a').data).toBe('');
    expect(new F({}).get('a').data).toBe('');
  });

  it('should turn non-string input into the empty string', () => {
    const field = new F({ a: 42 }).get('a');
    expect(field.data).toBe('');
    expect(field.rawData).toBe(42);
  });
});

describe('IntegerField', () => {
  class F extends Json {
    static fields = {
      a: IntegerField.unbound(),
      b: IntegerField.unbound({ default: 48 }),
    };
  }

  it('should coerce numeric strings and reject the rest', () => {
    const json = new F({ a: 'v', b: '-15' });
    const a = json.get('a');
    const b = json.get('b');
    expect(a.data).toBeNull();
    expect(a.rawData).toBe('v');
    expect(a.value()).toBeNull();
    expect(b.data).toBe(-15);
    expect(b.value()).toBe(-15);
    expect(a.validate(json)).toBe(false);
    expect(b.validate(json)).toBe(true);
  });

  it('should record one process error for unusable input', () => {
    const json = new F({ a: [], b: '' });
    expect(json.get('a').data).toBeNull();
    expect(json.get('a').rawData).toEqual([]);
    expect(json.get('b').data).toBeNull();
    expect(json.get('b').rawData).toBe('');
    expect(json.validate()).toBe(false);
    expect(json.get('b').processErrors).toEqual(['Not a valid integer value']);
    expect(json.get('b').errors).toEqual(['Not a valid integer value']);
  });

  it('should take object data', () => {
    expect(new F(null, { data: { b: 9 } }).get('b').data).toBe(9);
  });

  it('should trim strings and reject fractions', () => {
    const json = new F({ a: ' 12 ', b: 1.5 });
    expect(json.get('a').data).toBe(12);
    expect(json.get('b').data).toBeNull();
    expect(json.get('b').processErrors).toEqual(['Not a valid integer value']);
  });

  it('should leave a missing key without an error', () => {
    const json = new F({});
    expect(json.get('a').data).toBeNull();
    expect(json.get('b').data).toBe(48);
    expect(json.validate()).toBe(true);
  });
});

describe('FloatField', () => {
  class F extends Json {
    static fields = {
      a: FloatField.unbound(),
      b: FloatField.unbound({ default: 48.0 }),
    };
  }

  it('should coerce numeric strings and reject the rest', () => {
    const json = new F({ a: 'v', b: '-15.0' });
    expect(json.get('a').data).toBeNull();
    expect(json.get('a').rawData).toBe('v');
    expect(json.get('b').data).toBe(-15);
    expect(json.get('a').validate(json)).toBe(false);
    expect(json.get('b').validate(json)).toBe(true);
  });

  it('should reject blank strings and arrays', () => {
    const json = new F({ a: [], b: '' });
    expect(json.get('a').data).toBeNull();
    expect(json.get('b').data).toBeNull();
    expect(json.validate()).toBe(false);
    expect(json.get('b').errors).toEqual(['Not a valid float value']);
  });

  it('should accept exponents and surrounding whitespace', () => {
    const json = new F({ a: '1e3', b: ' 2.5 ' });
    expect(json.get('a').data).toBe(1000);
    expect(json.get('b').data).toBe(2.5);
  });

  it('should take object data', () => {
    expect(new F(null, { data: { b: 9.0 } }).get('b').data).toBe(9);
  });
});

describe('number parsing', () => {
  it('should parse integers', () => {
    expect(parseInteger(7)).toBe(7);
    expect(parseInteger('+7')).toBe(7);
    expect(parseInteger('7.0')).toBeNull();
    expect(parseInteger(true)).toBeNull();
    expect(parseInteger(Number.MAX_SAFE_INTEGER + 2)).toBeNull();
  });

  it('should parse floats', () => {
    expect(parseFloatValue('.5')).toBe(0.5);
    expect(parseFloatValue('-3.')).toBe(-3);
    expect(parseFloatValue('Infinity')).toBeNull();
    expect(parseFloatValue(Number.NaN)).toBeNull();
    expect(parseFloatValue('0x10')).toBeNull();
  });
});

describe('BooleanField', () => {
  class BoringJson extends Json {
    static fields = {
      bool1: BooleanField.unbound(),
      bool2: BooleanField.unbound({ default: true, falseValues: [] }),
    };
  }

  const obj = { bool1: null, bool2: true };

  it('should use defaults without input', () => {
    const json = new BoringJson();
    expect(json.get('bool1').rawData).toBeUndefined();
    expect(json.get('bool1').data).toBe(false);
    expect(json.get('bool2').data).toBe(true);
  });

  it('should read input values', () => {
    let json = new BoringJson({ bool1: 'a' });
    expect(json.get('bool1').rawData).toBe('a');
    expect(json.get('bool1').data).toBe(true);

    json = new BoringJson({ bool1: 'false', bool2: 'false' });
    expect(json.get('bool1').data).toBe(false);
    expect(json.get('bool2').data).toBe(true);
  });

  it('should read object data', () => {
    const json = new BoringJson(null, { obj });
    expect(json.get('bool1').data).toBe(false);
    expect(json.get('bool1').rawData).toBeUndefined();
    expect(json.get('bool2').data).toBe(true);
  });

  it('should prefer input over object data', () => {
    const json = new BoringJson({ bool1: 'y' }, { obj });
    expect(json.get('bool1').data).toBe(true);
    expect(json.get('bool2').data).toBe(true);
  });

  it('should be false when the key is missing and there is no data', () => {
    const json = new BoringJson({});
    expect(json.get('bool1').data).toBe(false);
    expect(json.get('bool2').data).toBe(true);
  });

  it('should treat blank input as false', () => {
    expect(new BoringJson({ bool1: false }).get('bool1').data).toBe(false);
    expect(new BoringJson({ bool1: null }).get('bool1').data).toBe(false);
    expect(new BoringJson({ bool1: true }).get('bool1').data).toBe(true);
  });
});

describe('DateField', () => {
  class F extends Json {
    static fields = {
      a: DateField.unbound(),
      b: DateField.unbound({ format: '%m/%d %Y' }),
    };
  }

  it('should parse dates with the default and a custom format', () => {
    const json = new F({ a: '2008-05-07', b: '05/07 2008' });
    expect(json.get('a').data).toEqual({ year: 2008, month: 5, day: 7 });
    expect(json.get('a').value()).toBe('2008-05-07');
    expect(json.get('b').data).toEqual({ year: 2008, month: 5, day: 7 });
    expect(json.get('b').value()).toBe('05/07 2008');
  });

  it('should record invalid dates', () => {
    const json = new F({ a: '2008-bb-cc', b: 'hi' });
    expect(json.validate()).toBe(false);
    expect(json.get('a').processErrors).toEqual(['Not a valid date value']);
    expect(json.get('a').errors).toHaveLength(1);
    expect(json.get('b').errors).toHaveLength(1);
  });

  it('should reject impossible days', () => {
    const json = new F({ a: '2023-02-29' });
    expect(json.get('a').processErrors).toEqual(['Not a valid date value']);
  });

  it('should leave blank input untouched', () => {
    const json = new F({ a: '' });
    expect(json.get('a').data).toBeNull();
    expect(json.get('a').value()).toBe('');
    expect(json.validate()).toBe(true);
  });

  it('should format object data', () => {
    const json = new F(null, { data: { b: { year: 2010, month: 12, day: 1 } } });
    expect(json.field('b', DateField).value()).toBe('12/01 2010');
  });
});

describe('TimeField', () => {
  class F extends Json {
    static fields = {
      a: TimeField.unbound(),
      b: TimeField.unbound({ format: '%H:%M' }),
    };
  }

  it('should parse times', () => {
    const json = new F({ a: '4:30', b: '04:30' });
    const expected = { hour: 4, minute: 30, second: 0, microsecond: 0 };
    expect(json.get('a').data).toEqual(expected);
    expect(json.get('a').value()).toBe('4:30');
    expect(json.get('b').data).toEqual(expected);
    expect(json.get('b').value()).toBe('04:30');
    expect(json.validate()).toBe(true);
  });

  it('should reject incomplete times', () => {
    const json = new F({ a: '04' });
    expect(json.validate()).toBe(false);
    expect(json.get('a').errors).toEqual(['Not a valid time value']);
  });
});

describe('DateTimeField', () => {
  class F extends Json {
    static fields = {
      a: DateTimeField.unbound(),
      b: DateTimeField.unbound({ format: '%Y-%m-%d %H:%M' }),
    };
  }

  const expected = { year: 2008, month: 5, day: 5, hour: 4, minute: 30, second: 0, microsecond: 0 };

  it('should parse date-times', () => {
    const json = new F({ a: '2008-05-05 04:30:00', b: '2008-05-05 04:30' });
    expect(json.get('a').data).toEqual(expected);
    expect(json.get('a').value()).toBe('2008-05-05 04:30:00');
    expect(json.get('b').data).toEqual(expected);
    expect(json.get('b').value()).toBe('2008-05-05 04:30');
    expect(json.validate()).toBe(true);
  });

  it('should reject input missing the time', () => {
    const json = new F({ a: '2008-05-05' });
    expect(json.validate()).toBe(false);
    expect(json.get('a').errors).toEqual(['Not a valid datetime value']);
  });

  it('should format object data', () => {
    const json = new F(null, { data: { a: expected, b: expected } });
    expect(json.validate()).toBe(true);
    expect(json.get('a').value()).toBe('2008-05-05 04:30:00');
    expect(json.get('b').value()).toBe('2008-05-05 04:30');
  });

  it('should parse microseconds', () => {
    class G extends Json {
      static fields = { a: DateTimeField.unbound({ format: '%Y-%m-%d %H:%M:%S.%f' }) };
    }
    expect(new G({ a: '2011-05-07 03:23:14.4242' }).get('a').data).toEqual({
      year: 2011,
      month: 5,
      day: 7,
      hour: 3,
      minute: 23,
      second: 14,
      microsecond: 424200,
    });
  });

  it('should reject non-string input', () => {
    const json = new F({ a: 20080505 });
    expect(json.get('a').data).toBeNull();
    expect(json.get('a').processErrors).toEqual(['Not a valid datetime value']);
  });
});
