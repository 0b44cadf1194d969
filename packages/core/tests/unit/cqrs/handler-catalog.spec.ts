/**
 * @fileoverview HandlerCatalog Unit Tests
 *
 * @license Apache-2.0
 */

import { describe, it, expect, beforeEach } from 'vitest';

import {
  HandlerCatalog,
  DuplicateHandlerError,
  MissingHandlerError,
  Request,
  type IRequestHandler,
} from '../../../src/application/cqrs';
import { ConfigurationError, type ServiceIdentifier } from '../../../src/domain/di';

// ============================================================================
// Test Fixtures
// ============================================================================

class GetInvoice extends Request<string> {}

class GetOverdueInvoice extends GetInvoice {}

class ArchiveInvoice extends Request {}

class GetInvoiceHandler implements IRequestHandler<GetInvoice, string> {
  handle(): string {
    return 'invoice';
  }
}

class CachedGetInvoiceHandler implements IRequestHandler<GetInvoice, string> {
  handle(): string {
    return 'cached';
  }
}

const everythingRegistered = (): boolean => true;

// ============================================================================
// Tests
// ============================================================================

describe('HandlerCatalog', () => {
  let catalog: HandlerCatalog;

  beforeEach(() => {
    catalog = new HandlerCatalog();
  });

  describe('lookup', () => {
    it('should find the handler by request class', () => {
      catalog.registerHandler(GetInvoice, GetInvoiceHandler, 'string');

      expect(catalog.lookup(GetInvoice)).toEqual({
        requestType: GetInvoice,
        handlerIdentifier: GetInvoiceHandler,
        resultType: 'string',
      });
    });

    it('should not route a subclass to its parent handler', () => {
      catalog.registerHandler(GetInvoice, GetInvoiceHandler);

      expect(catalog.lookup(GetOverdueInvoice)).toBeUndefined();
    });

    it('should return undefined for unknown request types', () => {
      expect(catalog.lookup(ArchiveInvoice)).toBeUndefined();
    });
  });

  describe('validate', () => {
    it('should reject a second handler for one request type', () => {
      catalog
        .registerHandler(GetInvoice, GetInvoiceHandler)
        .registerHandler(GetInvoice, CachedGetInvoiceHandler);

      expect(() => catalog.validate(everythingRegistered)).toThrow(DuplicateHandlerError);
      expect(() => catalog.validate(everythingRegistered)).toThrow(
        "Request 'GetInvoice' has 2 handlers (GetInvoiceHandler, CachedGetInvoiceHandler).",
      );
    });

    it('should reject a declared request without handler', () => {
      catalog.registerHandler(GetInvoice, GetInvoiceHandler).declareRequest(ArchiveInvoice);

      expect(() => catalog.validate(everythingRegistered)).toThrow(MissingHandlerError);
      expect(() => catalog.validate(everythingRegistered)).toThrow(
        "Request 'ArchiveInvoice' has no handler.",
      );
    });

    it('should reject a handler the container cannot resolve', () => {
      catalog.registerHandler(GetInvoice, GetInvoiceHandler);
      const isRegistered = (identifier: ServiceIdentifier): boolean =>
        identifier !== GetInvoiceHandler;

      expect(() => catalog.validate(isRegistered)).toThrow(
        "Request 'GetInvoice' is handled by 'GetInvoiceHandler', which is not registered in the container.",
      );
    });

    it('should freeze the catalog once valid', () => {
      catalog.registerHandler(GetInvoice, GetInvoiceHandler).declareRequest(GetInvoice);

      catalog.validate(everythingRegistered);

      expect(catalog.isFrozen()).toBe(true);
      expect(() => catalog.registerHandler(ArchiveInvoice, GetInvoiceHandler)).toThrow(
        ConfigurationError,
      );
      expect(() => catalog.declareRequest(ArchiveInvoice)).toThrow(ConfigurationError);
      expect(catalog.lookup(GetInvoice)?.handlerIdentifier).toBe(GetInvoiceHandler);
    });

    it('should list registered and declared request types once', () => {
      catalog.registerHandler(GetInvoice, GetInvoiceHandler).declareRequest(GetInvoice);
      catalog.declareRequest(ArchiveInvoice);

      expect(catalog.requestTypes()).toEqual([GetInvoice, ArchiveInvoice]);
    });
  });
});
