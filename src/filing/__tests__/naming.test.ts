/**
 * Tests for File Naming
 *
 * Tests cover:
 * - sanitizeFilename: reserved and control characters
 * - supplierToLabel: accents, punctuation, length cap
 * - senderToLabel: subdomains, compound TLDs, missing domains
 * - buildFilename: date and label precedence, sentinel date
 */

import { describe, it, expect } from 'vitest';
import {
  DATE_SENTINEL,
  buildFilename,
  companyLabel,
  receivedDatePrefix,
  sanitizeFilename,
  senderToLabel,
  supplierToLabel,
} from '../naming.js';

describe('sanitizeFilename', () => {
  it('replaces reserved characters with underscores', () => {
    expect(sanitizeFilename('a/b:c?.pdf')).toBe('a_b_c_.pdf');
    expect(sanitizeFilename('<x>|"y"*\\z.pdf')).toBe('_x___y___z.pdf');
  });

  it('replaces control characters', () => {
    expect(sanitizeFilename('tab\there.pdf')).toBe('tab_here.pdf');
  });

  it('leaves ordinary names alone', () => {
    expect(sanitizeFilename('Facture N° 42 (copie).pdf')).toBe('Facture N° 42 (copie).pdf');
  });
});

describe('supplierToLabel', () => {
  it('strips accents and hyphenates', () => {
    expect(supplierToLabel('EDF Électricité de France')).toBe('edf-electricite-de-france');
  });

  it('collapses punctuation runs and trims hyphens', () => {
    expect(supplierToLabel('Orange S.A.')).toBe('orange-s-a');
    expect(supplierToLabel('  --Free SAS--  ')).toBe('free-sas');
  });

  it('caps labels at 40 characters', () => {
    expect(supplierToLabel('a'.repeat(50))).toBe('a'.repeat(40));
  });

  it('returns an empty label when nothing ASCII survives', () => {
    expect(supplierToLabel('株式会社')).toBe('');
  });
});

describe('senderToLabel', () => {
  it('takes the second-level domain', () => {
    expect(senderToLabel('noreply@shop.com')).toBe('shop');
    expect(senderToLabel('billing@notifications.amazon.fr')).toBe('amazon');
  });

  it('strips two labels for compound TLDs', () => {
    expect(senderToLabel('support@company.co.uk')).toBe('company');
    expect(senderToLabel('billing@mail.store.com.au')).toBe('store');
  });

  it('treats a bare compound suffix as an ordinary domain', () => {
    expect(senderToLabel('x@co.uk')).toBe('co');
  });

  it('handles single-label and missing domains', () => {
    expect(senderToLabel('root@localhost')).toBe('localhost');
    expect(senderToLabel('nobody@')).toBe('unknown');
    expect(senderToLabel('')).toBe('unknown');
  });
});

describe('companyLabel', () => {
  it('prefers the supplier slug', () => {
    expect(companyLabel('noreply@shop.com', 'Shop Ltd')).toBe('shop-ltd');
  });

  it('falls back to the sender when the supplier is absent or slugs to nothing', () => {
    expect(companyLabel('noreply@shop.com', null)).toBe('shop');
    expect(companyLabel('noreply@shop.com', '株式会社')).toBe('shop');
  });
});

describe('buildFilename', () => {
  const base = {
    receivedAt: '2025-06-20T14:30:00Z',
    sender: 'noreply@shop.com',
    originalName: 'order.pdf',
    invoiceDate: null,
    supplierName: null,
  };

  it('uses the received date and sender domain by default', () => {
    expect(buildFilename(base)).toBe('2025-06-20_shop_order.pdf');
  });

  it('lets the invoice date and supplier take precedence', () => {
    expect(buildFilename({ ...base, invoiceDate: '2025-06-18', supplierName: 'Shop Ltd' })).toBe(
      '2025-06-18_shop-ltd_order.pdf',
    );
  });

  it('sanitizes the original name', () => {
    expect(buildFilename({ ...base, originalName: 'june/2025.pdf' })).toBe('2025-06-20_shop_june_2025.pdf');
  });

  it('uses the sentinel when the received date does not parse', () => {
    expect(buildFilename({ ...base, receivedAt: 'not a date' })).toBe(`${DATE_SENTINEL}_shop_order.pdf`);
  });

  it('reads received dates in UTC', () => {
    expect(receivedDatePrefix('2025-06-20T23:30:00-02:00')).toBe('2025-06-21');
  });
});
