/*
 * Copyright (C) 2025-2026 flickleafy
 *
 * This program is free software: you can redistribute it and/or modify
 * it under the terms of the GNU General Public License as published by
 * the Free Software Foundation, either version 3 of the License, or
 * (at your option) any later version.
 *
 * This program is distributed in the hope that it will be useful,
 * but WITHOUT ANY WARRANTY; without even the implied warranty of
 * MERCHANTABILITY or FITNESS FOR A PARTICULAR PURPOSE. See the
 * GNU General Public License for more details.
 *
 * You should have received a copy of the GNU General Public License
 * along with this program. If not, see <https://www.gnu.org/licenses/>.
 */

/**
 * Initialization state machine
 *
 * @packageDocumentation
 */

import { NotReadyError } from '../errors';
import { IReadinessGate } from '../interfaces';

export enum LifecycleState {
  Uninitialized = 'uninitialized',
  Initializing = 'initializing',
  Ready = 'ready',
  Failed = 'failed',
}

/**
 * Tracks Uninitialized → Initializing → Ready | Failed.
 * Only the transitions below are allowed; anything else throws.
 */
export class ServiceLifecycle implements IReadinessGate {
  private current: LifecycleState = LifecycleState.Uninitialized;
  private failure: Error | null = null;

  get state(): LifecycleState {
    return this.current;
  }

  /** The error recorded by `fail()`, if any */
  get error(): Error | null {
    return this.failure;
  }

  begin(): void {
    this.transition(LifecycleState.Uninitialized, LifecycleState.Initializing);
  }

  complete(): void {
    this.transition(LifecycleState.Initializing, LifecycleState.Ready);
  }

  fail(error: Error): void {
    this.transition(LifecycleState.Initializing, LifecycleState.Failed);
    this.failure = error;
  }

  isReady(): boolean {
    return this.current === LifecycleState.Ready;
  }

  assertReady(): void {
    if (!this.isReady()) {
      throw new NotReadyError(
        this.current === LifecycleState.Failed ? 'Chatbot initialization failed' : 'Chatbot not initialized',
        this.failure ?? undefined,
      );
    }
  }

  private transition(from: LifecycleState, to: LifecycleState): void {
    if (this.current !== from) {
      throw new Error(`Invalid lifecycle transition ${this.current} -> ${to}`);
    }
    this.current = to;
  }
}
