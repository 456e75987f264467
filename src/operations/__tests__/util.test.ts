/**
 * Tests for filter and datastore encoders
 */

import { describe, it, expect, vi } from 'vitest';
import { buildFilter, datastoreOrUrl } from '../util.js';
import { qualify } from '../../xml/qualify.js';
import { newElement } from '../../xml/element.js';
import { MissingCapabilityError, OperationError, XmlError } from '../../errors/index.js';
import type { FilterSpec } from '../../types/index.js';

const FILTER = qualify('filter');

describe('buildFilter', () => {
  it('should build a subtree filter around the criteria', () => {
    const filter = buildFilter({
      type: 'subtree',
      criteria: '<interfaces xmlns="urn:example:if"/>',
    });

    expect(filter).toEqual({
      tag: FILTER,
      attributes: { type: 'subtree' },
      children: [{ tag: '{urn:example:if}interfaces', attributes: {}, children: [] }],
    });
  });

  it('should append element criteria as given', () => {
    const criteria = newElement('{urn:example:sys}system');
    const filter = buildFilter({ type: 'subtree', criteria });

    expect(filter.children[0]).toBe(criteria);
  });

  it('should build an xpath filter and assert the xpath capability', () => {
    const assertCapability = vi.fn();
    const filter = buildFilter({ type: 'xpath', select: '/interfaces/interface' }, assertCapability);

    expect(filter).toEqual({
      tag: FILTER,
      attributes: { type: 'xpath', select: '/interfaces/interface' },
      children: [],
    });
    expect(assertCapability).toHaveBeenCalledWith(':xpath');
  });

  it('should propagate a failed capability assertion', () => {
    const assertCapability = (capability: string): void => {
      throw new MissingCapabilityError(capability);
    };

    expect(() => buildFilter({ type: 'xpath', select: '/a' }, assertCapability)).toThrow(
      MissingCapabilityError
    );
  });

  it('should accept a ready-made filter element', () => {
    const filter = buildFilter('<filter type="subtree"><top xmlns="urn:t"/></filter>');

    expect(filter.tag).toBe('filter');
    expect(filter.children[0]?.tag).toBe('{urn:t}top');
  });

  it('should assert xpath for a ready-made xpath filter', () => {
    const assertCapability = vi.fn();
    buildFilter(
      `<filter xmlns="urn:ietf:params:xml:ns:netconf:base:1.0" type="xpath" select="/a"/>`,
      assertCapability
    );

    expect(assertCapability).toHaveBeenCalledWith(':xpath');
  });

  it('should reject a ready-made filter without a type', () => {
    expect(() => buildFilter('<filter><top/></filter>')).toThrow(XmlError);
  });

  it('should reject an element that is not a filter', () => {
    expect(() => buildFilter(newElement('select', { type: 'subtree' }))).toThrow(
      'Element [select] does not meet requirement'
    );
  });

  it('should reject an unknown filter type', () => {
    const spec: FilterSpec = JSON.parse('{"type":"regex","select":".*"}');

    expect(() => buildFilter(spec)).toThrow(OperationError);
    expect(() => buildFilter(spec)).toThrow('Invalid filter type: regex');
  });
});

describe('datastoreOrUrl', () => {
  it('should encode a datastore name as an empty element', () => {
    expect(datastoreOrUrl('source', 'running')).toEqual({
      tag: qualify('source'),
      attributes: {},
      children: [{ tag: qualify('running'), attributes: {}, children: [] }],
    });
  });

  it('should encode a URL and assert the url capability', () => {
    const assertCapability = vi.fn();
    const node = datastoreOrUrl('source', 'file:///backup/config.xml', assertCapability);

    expect(node).toEqual({
      tag: qualify('source'),
      attributes: {},
      children: [
        { tag: qualify('url'), attributes: {}, children: [], text: 'file:///backup/config.xml' },
      ],
    });
    expect(assertCapability).toHaveBeenCalledWith(':url');
  });

  it('should not assert anything for a datastore name', () => {
    const assertCapability = vi.fn();
    datastoreOrUrl('target', 'candidate', assertCapability);

    expect(assertCapability).not.toHaveBeenCalled();
  });

  it('should reject an empty location', () => {
    expect(() => datastoreOrUrl('source', ' ')).toThrow(OperationError);
  });
});
