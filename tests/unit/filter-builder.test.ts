import { describe, it, expect } from 'vitest';
import { FilterBuilder } from '../../src/filters/builder.js';
import { Relation, ALL_RELATIONS } from '../../src/filters/relation.js';
import { ValidationError } from '../../src/errors.js';

describe('FilterBuilder', () => {

  // ---------------------------------------------------------------------------
  // Construction
  // ---------------------------------------------------------------------------
  describe('construction', () => {
    it('new builder has no terms', () => {
      const builder = new FilterBuilder();
      expect(builder.terms).toEqual([]);
      expect(builder.length).toBe(0);
      expect(builder.isEmpty()).toBe(true);
    });

    it('empty builder serializes to []', () => {
      expect(new FilterBuilder().toWireFormat()).toEqual([]);
    });
  });

  // ---------------------------------------------------------------------------
  // Per-field predicates
  // ---------------------------------------------------------------------------
  describe('per-field predicates', () => {
    it('sessionCount(=, 5) serializes field, relation and value', () => {
      const wire = new FilterBuilder().sessionCount(Relation.Equal, 5).toWireFormat();
      expect(wire).toEqual([{ field: 'session_count', relation: '=', value: 5 }]);
      expect(JSON.stringify(wire)).toBe('[{"field":"session_count","relation":"=","value":5}]');
    });

    it('lastSession and firstSession carry hours as the value', () => {
      const wire = new FilterBuilder()
        .lastSession(Relation.GreaterThan, 1.5)
        .firstSession(Relation.LowerThan, 48)
        .toWireFormat();
      expect(wire).toEqual([
        { field: 'last_session', relation: '>', value: 1.5 },
        { field: 'first_session', relation: '<', value: 48 },
      ]);
    });

    it('sessionTime and amountSpent', () => {
      const wire = new FilterBuilder()
        .sessionTime(Relation.GreaterThan, 600)
        .amountSpent(Relation.Equal, 9.99)
        .toWireFormat();
      expect(wire).toEqual([
        { field: 'session_time', relation: '>', value: 600 },
        { field: 'amount_spent', relation: '=', value: 9.99 },
      ]);
    });

    it('boughtSku uses the SKU name as the field and emits no key', () => {
      const wire = new FilterBuilder().boughtSku('com.example.gems', Relation.GreaterThan, 2).toWireFormat();
      expect(wire).toEqual([{ field: 'com.example.gems', relation: '>', value: 2 }]);
      expect(wire[0]).not.toHaveProperty('key');
    });

    it('tag emits field "tag" with the tag name under key', () => {
      const wire = new FilterBuilder().tag('level', Relation.GreaterThan, '10').toWireFormat();
      expect(wire).toEqual([{ field: 'tag', key: 'level', relation: '>', value: '10' }]);
    });

    it('tag with exists still accepts and emits the value', () => {
      const wire = new FilterBuilder().tag('vip', Relation.Exists, '').toWireFormat();
      expect(JSON.stringify(wire)).toBe('[{"field":"tag","key":"vip","relation":"exists","value":""}]');
    });

    it('tag accepts every relation', () => {
      for (const relation of ALL_RELATIONS) {
        expect(() => new FilterBuilder().tag('k', relation, 'v')).not.toThrow();
      }
    });

    it('language and appVersion carry string values', () => {
      const wire = new FilterBuilder()
        .language(Relation.NotEqual, 'fr')
        .appVersion(Relation.LowerThan, '2.4.0')
        .toWireFormat();
      expect(wire).toEqual([
        { field: 'language', relation: '!=', value: 'fr' },
        { field: 'app_version', relation: '<', value: '2.4.0' },
      ]);
    });

    it('country always serializes with "="', () => {
      expect(new FilterBuilder().country('US').toWireFormat())
        .toEqual([{ field: 'country', relation: '=', value: 'US' }]);
    });

    it('location emits radius, lat and long with no field or relation', () => {
      const wire = new FilterBuilder().location(10, 54.324, 45.754).toWireFormat();
      expect(JSON.stringify(wire)).toBe('[{"radius":10,"lat":54.324,"long":45.754}]');
      expect(wire[0]).not.toHaveProperty('field');
      expect(wire[0]).not.toHaveProperty('relation');
    });
  });

  // ---------------------------------------------------------------------------
  // Relation validation
  // ---------------------------------------------------------------------------
  describe('relation validation', () => {
    it('lastSession rejects "="', () => {
      expect(() => new FilterBuilder().lastSession(Relation.Equal, 1)).toThrow(ValidationError);
    });

    it('sessionTime rejects "!="', () => {
      expect(() => new FilterBuilder().sessionTime(Relation.NotEqual, 1)).toThrow(ValidationError);
    });

    it('amountSpent rejects "!="', () => {
      expect(() => new FilterBuilder().amountSpent(Relation.NotEqual, 1)).toThrow(ValidationError);
    });

    it('boughtSku rejects "exists" and reports the SKU as the field', () => {
      try {
        new FilterBuilder().boughtSku('sku-1', Relation.Exists, 1);
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(ValidationError);
        expect(err).toMatchObject({ code: 'RELATION_NOT_ACCEPTED', field: 'sku-1', relation: 'exists' });
      }
    });

    it('language rejects ">"', () => {
      expect(() => new FilterBuilder().language(Relation.GreaterThan, 'en')).toThrow(
        "relation not accepted for this field (field 'language', relation '>')",
      );
    });

    it('sessionCount rejects "not_exists"', () => {
      expect(() => new FilterBuilder().sessionCount(Relation.NotExists, 3)).toThrow(ValidationError);
    });

    it('a rejected call appends nothing', () => {
      const builder = new FilterBuilder().country('DE');
      expect(() => builder.firstSession(Relation.Exists, 2)).toThrow(ValidationError);
      expect(builder.length).toBe(1);
    });
  });

  // ---------------------------------------------------------------------------
  // Names and numbers that would not survive serialization
  // ---------------------------------------------------------------------------
  describe('term validation', () => {
    it('tag rejects an empty key', () => {
      const builder = new FilterBuilder();
      expect(() => builder.tag('', Relation.Exists, '')).toThrow('tag key must be a non-empty string');
      expect(builder.length).toBe(0);
    });

    it.each(['', 'country', 'tag', 'bought_sku'])('boughtSku rejects the SKU name %j', (name) => {
      try {
        new FilterBuilder().boughtSku(name, Relation.GreaterThan, 1);
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(ValidationError);
        expect(err).toMatchObject({
          code: 'INVALID_TERM',
          field: name,
          message: `'${name}' cannot be used as a SKU name`,
        });
      }
    });

    it('rejects non-finite predicate values', () => {
      expect(() => new FilterBuilder().sessionCount(Relation.Equal, Number.NaN)).toThrow(
        'session_count must be a finite number, got NaN',
      );
      expect(() => new FilterBuilder().boughtSku('gems', Relation.GreaterThan, Infinity)).toThrow(
        'gems must be a finite number, got Infinity',
      );
    });

    it('rejects non-finite coordinates', () => {
      const builder = new FilterBuilder();
      expect(() => builder.location(Infinity, 1, 2)).toThrow('radius must be a finite number, got Infinity');
      expect(() => builder.location(1, 2, -Infinity)).toThrow('long must be a finite number, got -Infinity');
      expect(builder.length).toBe(0);
    });
  });

  // ---------------------------------------------------------------------------
  // Term integrity
  // ---------------------------------------------------------------------------
  describe('term integrity', () => {
    it('terms returns a fresh snapshot', () => {
      const builder = new FilterBuilder().country('US');
      const snapshot = builder.terms;
      builder.and();
      expect(snapshot).toHaveLength(1);
      expect(builder.terms).not.toBe(builder.terms);
    });

    it('appended terms cannot be edited', () => {
      const builder = new FilterBuilder().lastSession(Relation.GreaterThan, 1);
      const [term] = builder.terms;
      expect(Object.isFrozen(term)).toBe(true);
      expect(() => Object.assign(term ?? {}, { relation: Relation.Exists })).toThrow(TypeError);
      expect(builder.toWireFormat()).toEqual([{ field: 'last_session', relation: '>', value: 1 }]);
    });
  });

  // ---------------------------------------------------------------------------
  // Operators and chaining
  // ---------------------------------------------------------------------------
  describe('operators and chaining', () => {
    it('sessionCount.and.sessionTime yields predicate, AND, predicate', () => {
      const wire = new FilterBuilder()
        .sessionCount(Relation.GreaterThan, 10)
        .and()
        .sessionTime(Relation.LowerThan, 2000)
        .toWireFormat();
      expect(wire).toEqual([
        { field: 'session_count', relation: '>', value: 10 },
        { operator: 'AND' },
        { field: 'session_time', relation: '<', value: 2000 },
      ]);
    });

    it('or() appends an OR marker', () => {
      const wire = new FilterBuilder().country('US').or().country('CA').toWireFormat();
      expect(wire[1]).toEqual({ operator: 'OR' });
    });

    it('every method returns the same instance', () => {
      const builder = new FilterBuilder();
      expect(builder.lastSession(Relation.GreaterThan, 1)).toBe(builder);
      expect(builder.and()).toBe(builder);
      expect(builder.location(5, 1, 2)).toBe(builder);
      expect(builder.or()).toBe(builder);
      expect(builder.tag('k', Relation.Exists, '')).toBe(builder);
    });

    it('permissive mode accepts leading, doubled and trailing operators', () => {
      const wire = new FilterBuilder().or().and().and().country('US').or().toWireFormat();
      expect(wire).toEqual([
        { operator: 'OR' },
        { operator: 'AND' },
        { operator: 'AND' },
        { field: 'country', relation: '=', value: 'US' },
        { operator: 'OR' },
      ]);
    });
  });

  // ---------------------------------------------------------------------------
  // Serialization
  // ---------------------------------------------------------------------------
  describe('serialization', () => {
    it('toWireFormat is idempotent', () => {
      const builder = new FilterBuilder().tag('plan', Relation.Equal, 'pro').and().location(100, 1, 2);
      expect(builder.toWireFormat()).toEqual(builder.toWireFormat());
      expect(builder.length).toBe(3);
    });

    it('returned objects are fresh copies', () => {
      const builder = new FilterBuilder().country('US');
      const first = builder.toWireFormat();
      first.push({ operator: 'OR' });
      expect(builder.toWireFormat()).toEqual([{ field: 'country', relation: '=', value: 'US' }]);
      expect(builder.toWireFormat()[0]).not.toBe(first[0]);
    });

    it('JSON.stringify(builder) produces the wire array', () => {
      const builder = new FilterBuilder().sessionCount(Relation.Equal, 5);
      expect(JSON.stringify(builder)).toBe('[{"field":"session_count","relation":"=","value":5}]');
    });

    it('predicate keys are emitted in field, key, relation, value order', () => {
      const [term] = new FilterBuilder().tag('level', Relation.LowerThan, '3').toWireFormat();
      expect(Object.keys(term ?? {})).toEqual(['field', 'key', 'relation', 'value']);
    });

    it('terms exposes the typed model', () => {
      const builder = new FilterBuilder().tag('vip', Relation.Exists, '').and().location(1, 2, 3);
      expect(builder.terms).toEqual([
        { kind: 'predicate', field: 'tag', key: 'vip', relation: 'exists', value: '' },
        { kind: 'operator', operator: 'AND' },
        { kind: 'geo', radius: 1, lat: 2, long: 3 },
      ]);
    });
  });
});
