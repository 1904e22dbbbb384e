/**
 * Tests for provider classification
 */

import { classifyProvider, isHotmail, normalizeMxHost } from '../src/validators/providers';
import { Provider } from '../src/types/email';

describe('classifyProvider', () => {
  it.each([
    ['gmail-smtp-in.l.google.com', Provider.GMAIL],
    ['aspmx.l.google.com.', Provider.GMAIL],
    ['alt1.gmail-smtp-in.l.googlemail.com', Provider.GMAIL],
    ['hotmail-com.olc.protection.outlook.com', Provider.HOTMAIL_B2C],
    ['contoso-com.mail.protection.outlook.com', Provider.HOTMAIL_B2B],
    ['mta5.am0.yahoodns.net', Provider.YAHOO],
    ['eu-smtp-inbound-1.mimecast.com', Provider.MIMECAST],
    ['mx0a-00123456.pphosted.com', Provider.PROOFPOINT],
    ['mx1.ppe-hosted.com', Provider.PROOFPOINT],
    ['mx.example.com', Provider.EVERYTHING_ELSE],
    ['127.0.0.1', Provider.EVERYTHING_ELSE],
  ])('should classify %s as %s', (host, provider) => {
    expect(classifyProvider(host)).toBe(provider);
  });

  it('should be case-insensitive', () => {
    expect(classifyProvider('ASPMX.L.GOOGLE.COM')).toBe(Provider.GMAIL);
  });

  it('should match whole labels only', () => {
    expect(classifyProvider('mx.notgoogle.com')).toBe(Provider.EVERYTHING_ELSE);
    expect(classifyProvider('fakemimecast.com')).toBe(Provider.EVERYTHING_ELSE);
  });

  it('should group both Microsoft categories', () => {
    expect(isHotmail('hotmail-com.olc.protection.outlook.com')).toBe(true);
    expect(isHotmail('contoso-com.mail.protection.outlook.com')).toBe(true);
    expect(isHotmail('mx.example.com')).toBe(false);
  });
});

describe('normalizeMxHost', () => {
  it('should trim, lowercase and drop trailing dots', () => {
    expect(normalizeMxHost('  MX.Example.COM.. ')).toBe('mx.example.com');
  });
});
