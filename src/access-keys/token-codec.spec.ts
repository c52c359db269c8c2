import { CryptoService } from '../crypto/crypto.service';
import { DecryptionError, MalformedTokenError } from './errors';
import { parseTokenPayload, TokenCodec } from './token-codec';

describe('TokenCodec', () => {
  const cryptoService = new CryptoService();
  const codec = new TokenCodec(cryptoService, 'test-secret');

  it('issues tokens that decode to the record reference', () => {
    const { token, verificationHash } = codec.issue(42, 'query');

    expect(codec.decode(token)).toEqual({ recordId: 42, recordKind: 'query' });
    expect(verificationHash).toBe(cryptoService.hash(token));
    expect(cryptoService.decrypt(token, 'test-secret')).toBe('Id:42,Type:QueryKey');
  });

  it('ignores surrounding whitespace when decoding and hashing', () => {
    const { token, verificationHash } = codec.issue(3, 'endpoint');

    expect(codec.decode(`  ${token}\n`)).toEqual({ recordId: 3, recordKind: 'endpoint' });
    expect(codec.verificationHash(` ${token} `)).toBe(verificationHash);
  });

  it('surfaces decryption failures', () => {
    expect(() => codec.decode('garbage')).toThrow(DecryptionError);
  });

  it('rejects a well-encrypted payload without a kind', () => {
    const token = cryptoService.encrypt('Id:5', 'test-secret');

    expect(() => codec.decode(token)).toThrow(MalformedTokenError);
  });
});

describe('parseTokenPayload', () => {
  it('accepts fields in any order', () => {
    expect(parseTokenPayload('Type:EndpointKey,Id:9')).toEqual({
      recordId: 9,
      recordKind: 'endpoint',
    });
  });

  it('matches the kind name case-insensitively', () => {
    expect(parseTokenPayload('Id:1,Type:querykey')).toEqual({ recordId: 1, recordKind: 'query' });
  });

  it.each([
    ['missing id', 'Type:QueryKey'],
    ['missing type', 'Id:1'],
    ['duplicate id', 'Id:1,Id:2,Type:QueryKey'],
    ['negative id', 'Id:-1,Type:QueryKey'],
    ['fractional id', 'Id:1.5,Type:QueryKey'],
    ['non-numeric id', 'Id:abc,Type:QueryKey'],
    ['unknown kind', 'Id:1,Type:AdminKey'],
    ['empty payload', ''],
  ])('rejects %s', (_label, payload) => {
    expect(() => parseTokenPayload(payload)).toThrow(MalformedTokenError);
  });
});
