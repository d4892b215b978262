import { canonicalPattern, canonicalSectionName, canonicalizeSignature, usableFragments } from '../signature';
import { isNoiseFragment, sanitizeFragment } from '../../catalog/fragments';

describe('tracker signatures', () => {
  describe('canonicalizeSignature', () => {
    it('collapses dots before pipes, strips the trailing dot and turns dots into slashes', () => {
      expect(canonicalizeSignature('a.b.|c.d.')).toEqual(['a/b', 'c/d']);
    });

    it('strips leading dots', () => {
      expect(canonicalizeSignature('..com.flurry')).toEqual(['com/flurry']);
    });

    it('unescapes slashes and trims fragments', () => {
      expect(canonicalizeSignature('com\\/foo.bar | org.baz ')).toEqual(['com/foo/bar', 'org/baz']);
    });

    it('keeps noise fragments in place', () => {
      expect(canonicalizeSignature('.-.-.')).toEqual(['-/-']);
    });
  });

  describe('usableFragments', () => {
    it('yields nothing for a pure noise signature', () => {
      expect(usableFragments('.-.-.')).toEqual([]);
    });

    it('drops noise fragments between real ones', () => {
      expect(usableFragments('com.ad.net.|.-.|org.adnet.')).toEqual(['com/ad/net', 'org/adnet']);
    });

    it('drops empty alternatives', () => {
      expect(usableFragments('com.flurry||')).toEqual(['com/flurry']);
    });
  });

  it('joins usable fragments into a pattern', () => {
    expect(canonicalPattern('com.google.ads.|com.google.android.gms.ads.')).toBe('com/google/ads|com/google/android/gms/ads');
  });

  it('derives lower-case alphanumeric section names', () => {
    expect(canonicalSectionName('Google AdMob')).toBe('googleadmob');
    expect(canonicalSectionName('Facebook Ads (SDK)')).toBe('facebookadssdk');
    expect(canonicalSectionName('!!!')).toBe('');
  });
});

describe('fragment noise', () => {
  it('strips everything outside identifiers and slashes', () => {
    expect(sanitizeFragment('Landroid/os/Build;->MODEL')).toBe('Landroid/os/BuildMODEL');
  });

  it('treats slashes alone as noise', () => {
    expect(isNoiseFragment('/')).toBe(true);
    expect(isNoiseFragment('-/-')).toBe(true);
    expect(isNoiseFragment('')).toBe(true);
    expect(isNoiseFragment('a/')).toBe(false);
  });
});
