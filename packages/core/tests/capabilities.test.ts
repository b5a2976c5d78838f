import { describe, expect, it } from 'vitest';
import {
  CapabilityNegotiationError,
  buildClientCapabilities,
  toCapabilitiesJson,
  type CatalogDocument
} from '../src/index';

const named: CatalogDocument = { catalogId: 'https://example.com/catalogs/basic.json', components: { Text: {} } };
const anonymousA: CatalogDocument = { components: { Chart: { type: 'object' } } };
const anonymousB: CatalogDocument = { components: { Map: {} }, functions: { zoom: {} } };

describe('client capabilities', () => {
  it('inlines only catalogs without an id by default', () => {
    const capabilities = buildClientCapabilities([named, anonymousA, anonymousB]);

    expect(capabilities.supportedCatalogIds).toEqual(['https://example.com/catalogs/basic.json']);
    expect(capabilities.inlineCatalogs?.map((catalog) => catalog.catalogId)).toEqual([
      'inline_catalog_1',
      'inline_catalog_2'
    ]);
  });

  it('inlines everything under "all"', () => {
    const capabilities = buildClientCapabilities([named, anonymousA], { inlineHandling: 'all' });

    expect(capabilities.supportedCatalogIds).toEqual([]);
    expect(capabilities.inlineCatalogs?.map((catalog) => catalog.catalogId)).toEqual([
      'https://example.com/catalogs/basic.json',
      'inline_catalog_1'
    ]);
  });

  it('refuses anonymous catalogs under "none"', () => {
    expect(() => buildClientCapabilities([named, anonymousA], { inlineHandling: 'none' }))
      .toThrow(CapabilityNegotiationError);
    expect(buildClientCapabilities([named], { inlineHandling: 'none' }))
      .toEqual({ supportedCatalogIds: ['https://example.com/catalogs/basic.json'] });
  });

  it('wraps capabilities in the versioned envelope', () => {
    expect(toCapabilitiesJson(buildClientCapabilities([named]))).toEqual({
      'v0.9': { supportedCatalogIds: ['https://example.com/catalogs/basic.json'] }
    });

    expect(toCapabilitiesJson(buildClientCapabilities([anonymousB]))).toEqual({
      'v0.9': {
        supportedCatalogIds: [],
        inlineCatalogs: [{ components: { Map: {} }, catalogId: 'inline_catalog_1', functions: { zoom: {} } }]
      }
    });
  });
});
