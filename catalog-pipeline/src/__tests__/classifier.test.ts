import { describe, expect, it } from 'vitest';
import { compileRuleTable } from '../classify/ruleTable.js';
import { Classifier } from '../classify/classifier.js';
import { rulesClassifier } from './fixtures.js';

describe('Classifier.classify', () => {
  const classifier = rulesClassifier();

  it('files a GE french door refrigerator under appliances', () => {
    expect(classifier.classify('GE 27 cu. ft. French Door Refrigerator', 'GE')).toEqual({
      category: 'appliances',
      subcategory: 'french-door',
    });
  });

  it('takes the first matching category in rule order', () => {
    // "vanity ... bathroom" is bath, even though "sink" would also match plumbing
    expect(classifier.classify('36 in. Bathroom Vanity with Sink').category).toBe('bath');
  });

  it('keeps deny-listed brands out of appliances', () => {
    const verdict = classifier.classify('StyleWell Rolling Kitchen Cart with Microwave Shelf', 'StyleWell');
    expect(verdict.category).toBe('furniture');
    expect(verdict.subcategory).toBe('kitchen-carts');
  });

  it('falls back to the overflow category without a confident match', () => {
    expect(classifier.classify('Assorted Widget Pack')).toEqual({ category: 'other', subcategory: null });
  });

  it('leaves the subcategory unset when no pattern matches', () => {
    expect(classifier.classify('Pro Shop Garage Mat')).toEqual({ category: 'garage', subcategory: null });
  });
});

describe('Classifier.reclassify', () => {
  const classifier = rulesClassifier();

  it('moves a deny-listed brand cart out of appliances into furniture', () => {
    const product = { title: 'StyleWell Rolling Kitchen Cart', brand: 'StyleWell' };
    expect(classifier.reclassify(product, 'appliances')).toEqual({
      change: true,
      category: 'furniture',
      subcategory: 'kitchen-carts',
      ruleId: 'deny-brand-furniture-item',
    });
    expect(classifier.reclassify(product, 'furniture')).toEqual({ change: false });
  });

  it('pulls a refrigerator found outside the appliances tree back in', () => {
    const product = { title: 'Frigidaire 18 cu. ft. Top Freezer Refrigerator', brand: 'Frigidaire' };
    const verdict = classifier.reclassify(product, 'storage');
    expect(verdict).toEqual({
      change: true,
      category: 'appliances',
      subcategory: 'top-freezer',
      ruleId: 'appliance-brand-outside-appliances',
    });
  });

  it('never moves allow-listed appliance brands out of appliances', () => {
    const product = { title: 'Samsung Bespoke Kitchen Cart Panel', brand: 'Samsung' };
    expect(classifier.reclassify(product, 'appliances')).toEqual({ change: false });
  });

  it('keeps products in sticky categories', () => {
    const product = { title: 'Husky Garage Storage Cabinet', brand: 'Husky' };
    expect(classifier.reclassify(product, 'garage')).toEqual({ change: false });
  });

  it('is idempotent: a product that moved does not move again', () => {
    const products = [
      { title: 'StyleWell Rolling Kitchen Cart', brand: 'StyleWell' },
      { title: 'KOHLER Pull-Down Kitchen Faucet', brand: 'KOHLER' },
      { title: 'Nearly Natural Artificial Hydrangea Plant', brand: 'Nearly Natural' },
      { title: 'Lincoln Electric MIG Welder', brand: 'Lincoln Electric' },
      { title: 'NewAir Wine Cooler 24 Bottle', brand: 'NewAir' },
    ];
    for (const product of products) {
      const first = classifier.reclassify(product, 'appliances');
      const baseline = first.change ? first.category : 'appliances';
      expect(classifier.reclassify(product, baseline)).toEqual({ change: false });
    }
  });
});

describe('Classifier brand detection', () => {
  const classifier = rulesClassifier();

  it('prefers the longest brand name and matches whole words', () => {
    expect(classifier.detectBrand('Home Decorators Collection Oak Bookcase')).toBe('Home Decorators Collection');
    expect(classifier.detectBrand('Gelato Maker')).toBeNull();
    expect(classifier.detectBrand('GE Profile 30 in. Range')).toBe('GE');
  });

  it('reports allow and deny list membership case-insensitively', () => {
    expect(classifier.isApplianceBrand('samsung')).toBe(true);
    expect(classifier.isDeniedApplianceBrand('STYLEWELL')).toBe(true);
    expect(classifier.isApplianceBrand(undefined)).toBe(false);
  });
});

describe('compileRuleTable', () => {
  const base = {
    version: '1',
    overflowCategory: 'other',
    categories: [
      { category: 'widgets', name: 'Widgets', include: ['\\bwidget\\b'], exclude: [], subcategories: [] },
      { category: 'other', name: 'Other', include: [], exclude: [], subcategories: [] },
    ],
    applianceBrands: [],
    applianceDenyBrands: {},
    brandDetection: [],
    relocations: [],
  };

  it('classifies with a minimal table', () => {
    const classifier = new Classifier(compileRuleTable(base));
    expect(classifier.classify('Blue Widget').category).toBe('widgets');
    expect(classifier.classify('Gadget').category).toBe('other');
  });

  it('rejects a relocation that targets an unknown category', () => {
    const file = {
      ...base,
      relocations: [{ id: 'bad', when: {}, match: [], unless: [], action: { move: 'nowhere' } }],
    };
    expect(() => compileRuleTable(file)).toThrow('Relocation bad moves to unknown category nowhere');
  });
});
