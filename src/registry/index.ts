/**
 * Registry Module - Public API
 *
 * This module provides user management for the presence monitor:
 * - Registration and check-in
 * - Activity tracking (proof of life)
 * - Per-user alert configuration
 */

// Main facade
export { UserRegistry, default } from './user-registry.js';
export type { UserRegistryConfig, RegistrationResult } from './user-registry.js';

// In-memory table (for advanced use cases)
export { UserTable } from './user-table.js';
