/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Centralized type definitions to avoid circular dependencies.
 */

export * from './observer.js';
