/**
 * @module detectors/model-backed
 * @description Base class for detectors that run on a lazily loaded model backend
 * @status COMPLETE
 * @dependencies src/types/common.ts
 * @lastModified 2026-10-18
 */

import { toError } from '../types/common';

// ============================================================================
// Types
// ============================================================================

/**
 * Loads a backend, and optionally releases it
 */
export interface BackendProvider<TBackend> {
  load(): Promise<TBackend>;
  release?(backend: TBackend): Promise<void> | void;
}

type BackendState<TBackend> =
  | { ready: false }
  | { ready: true; backend: TBackend };

// ============================================================================
// Base Class
// ============================================================================

/**
 * Holds one backend behind a ready flag. Concurrent `load()` calls share the
 * same pending promise; a failed load leaves the detector unloaded so the
 * next call retries.
 */
export abstract class ModelBackedDetector<TBackend> {
  private state: BackendState<TBackend> = { ready: false };
  private pending: Promise<TBackend> | null = null;

  protected constructor(
    readonly name: string,
    private readonly provider: BackendProvider<TBackend>
  ) {}

  get isReady(): boolean {
    return this.state.ready;
  }

  async load(): Promise<void> {
    await this.acquire();
  }

  /**
   * Release a loaded backend. A load still in flight completes normally.
   */
  async dispose(): Promise<void> {
    if (!this.state.ready) return;
    const { backend } = this.state;
    this.state = { ready: false };
    await this.provider.release?.(backend);
  }

  /**
   * The loaded backend, loading it first if needed
   */
  protected acquire(): Promise<TBackend> {
    if (this.state.ready) return Promise.resolve(this.state.backend);

    if (this.pending === null) {
      this.pending = this.provider.load().then(
        (backend) => {
          this.state = { ready: true, backend };
          this.pending = null;
          return backend;
        },
        (error: unknown) => {
          this.pending = null;
          throw new Error(`Failed to load ${this.name}: ${toError(error).message}`);
        }
      );
    }

    return this.pending;
  }
}
