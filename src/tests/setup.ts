/**
 * Test Setup File
 * Configures the testing environment with necessary mocks and utilities
 */
import '@testing-library/jest-dom/vitest';
import { cleanup } from '@testing-library/react';
import { vi, beforeEach, afterEach } from 'vitest';
import type { AuthSession } from '../types/api';

// ============================================================================
// Mock matchMedia
// ============================================================================
Object.defineProperty(window, 'matchMedia', {
  writable: true,
  value: vi.fn().mockImplementation((query: string) => ({
    matches: false,
    media: query,
    onchange: null,
    addListener: vi.fn(),
    removeListener: vi.fn(),
    addEventListener: vi.fn(),
    removeEventListener: vi.fn(),
    dispatchEvent: vi.fn(),
  })),
});

// ============================================================================
// Global Test Hooks
// ============================================================================
beforeEach(() => {
  window.localStorage.clear();
});

afterEach(() => {
  cleanup();
  vi.clearAllMocks();
});

// ============================================================================
// Test Utilities
// ============================================================================

/**
 * Promise whose settlement the test controls
 */
export function createDeferred<T>() {
  let resolve: (value: T) => void = () => {};
  let reject: (reason: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/**
 * Helper to create a mock session
 */
export const createMockSession = (overrides: Partial<AuthSession> = {}): AuthSession => ({
  userId: 'user-1',
  token: 'test-token',
  anonymous: true,
  ...overrides,
});
