import { describe, it, expect } from 'vitest';
import { generateId, generateSecret, sha256Hex, verifyAdminKey } from '../../src/utils/crypto';

describe('Crypto Module', () => {
  describe('Admin Key Verification', () => {
    it('should accept the plain key whose SHA-256 matches ADMIN_KEY', () => {
      expect(verifyAdminKey('admin')).toBe(true);
    });

    it('should reject a different key', () => {
      expect(verifyAdminKey('not-the-admin')).toBe(false);
    });

    it('should reject the hash itself', () => {
      expect(verifyAdminKey('8c6976e5b5410415bde908bd4dee15dfb167a9c873fc4bb8a81f6f2ab448a918')).toBe(false);
    });

    it('should reject empty and missing keys', () => {
      expect(verifyAdminKey('')).toBe(false);
      expect(verifyAdminKey(undefined)).toBe(false);
    });
  });

  describe('sha256Hex', () => {
    it('should hash to lowercase hex', () => {
      expect(sha256Hex('admin')).toBe('8c6976e5b5410415bde908bd4dee15dfb167a9c873fc4bb8a81f6f2ab448a918');
    });
  });

  describe('ID Generation', () => {
    it('should prefix ids', () => {
      expect(generateId('dlv')).toMatch(/^dlv_[0-9a-f]{32}$/);
    });

    it('should generate bare ids without a prefix', () => {
      expect(generateId()).toMatch(/^[0-9a-f]{32}$/);
    });

    it('should not repeat', () => {
      const ids = new Set(Array.from({ length: 100 }, () => generateId('whk')));
      expect(ids.size).toBe(100);
    });
  });

  describe('Secret Generation', () => {
    it('should generate whsec_ prefixed base64url secrets', () => {
      const secret = generateSecret();
      expect(secret).toMatch(/^whsec_[A-Za-z0-9_-]{32}$/);
      expect(generateSecret()).not.toBe(secret);
    });
  });
});
