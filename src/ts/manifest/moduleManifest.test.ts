// src/ts/manifest/moduleManifest.test.ts
import { describe, it, expect, vi } from 'vitest';
import {
  parseModuleManifest,
  registerManifestRoutes,
  resolveManifestRoute,
  ManifestParseError,
  ManifestValidationError,
} from './moduleManifest.js';
import { HostNavigationService } from '../navigation/hostNavigationService.js';

const WALLET_MANIFEST = `
moduleId: wallet
modulePath: /wallet
displayName: Wallet
version: 2.1.0
availableRoutes:
  history: /wallet/history
  topup: /wallet/topup
requiredPermissions:
  - payments.read
  - payments.write
metadata:
  category: finance
`;

describe('parseModuleManifest', () => {
  it('parses a complete manifest', () => {
    expect(parseModuleManifest(WALLET_MANIFEST)).toEqual({
      moduleId: 'wallet',
      modulePath: '/wallet',
      displayName: 'Wallet',
      version: '2.1.0',
      availableRoutes: { history: '/wallet/history', topup: '/wallet/topup' },
      requiredPermissions: ['payments.read', 'payments.write'],
      metadata: { category: 'finance' },
    });
  });

  it('fills defaults for a minimal manifest', () => {
    expect(parseModuleManifest('moduleId: rewards\nmodulePath: /rewards\n')).toEqual({
      moduleId: 'rewards',
      modulePath: '/rewards',
      displayName: 'rewards',
      version: '1.0.0',
      availableRoutes: {},
      requiredPermissions: [],
      metadata: {},
    });
  });

  it('throws ManifestParseError on malformed YAML', () => {
    const attempt = () => parseModuleManifest('moduleId: [wallet', 'wallet.yaml');

    expect(attempt).toThrow(ManifestParseError);
    expect(attempt).toThrow(/^Failed to parse module manifest: wallet\.yaml/);
  });

  it('throws ManifestValidationError naming the offending field', () => {
    const attempt = () => parseModuleManifest('moduleId: wallet\nmodulePath: wallet\n', 'wallet.yaml');

    expect(attempt).toThrow(ManifestValidationError);
    expect(attempt).toThrow("Invalid module manifest wallet.yaml: modulePath: Routes must start with '/'");
  });

  it('rejects an empty document', () => {
    try {
      parseModuleManifest('');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ManifestValidationError);
      if (error instanceof ManifestValidationError) {
        expect(error.source).toBe('module.yaml');
        expect(error.issues[0].path).toEqual([]);
      }
    }
  });
});

describe('manifest helpers', () => {
  it('registers the module path on a host navigation service', () => {
    const navigate = vi.fn();
    const service = new HostNavigationService({ navigate });

    registerManifestRoutes(service, parseModuleManifest(WALLET_MANIFEST));
    service.navigateToModule('wallet', { route: '/history' });

    expect(service.registeredRoutes).toEqual({ wallet: '/wallet' });
    expect(navigate).toHaveBeenCalledWith('/wallet', { route: '/history' });
  });

  it('resolves declared sub-routes only', () => {
    const manifest = parseModuleManifest(WALLET_MANIFEST);

    expect(resolveManifestRoute(manifest, 'history')).toBe('/wallet/history');
    expect(resolveManifestRoute(manifest, 'settings')).toBeUndefined();
    expect(resolveManifestRoute(manifest, 'constructor')).toBeUndefined();
  });
});
