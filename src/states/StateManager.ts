/**
 * State System
 *
 * Tracks each user's current conversational step. States come from a static
 * list; the free state is the resting point between flows and is always valid.
 * With parameters enabled, every state change also stores a parameter object
 * alongside the state.
 *
 * @since 2025
 */
import { LogEngine } from '@wgtechlabs/log-engine';
import type { Storage } from '../storage/Storage.js';
import type { StateParams } from '../types/index.js';
import { StateError, getErrorMessage } from '../utils/errorHandler.js';

export interface StateManagerOptions {
  usersCollection?: string;
  idColumn?: string;
  stateColumn?: string;
  paramsColumn?: string;
  freeState?: string;
  withParams?: boolean;
}

function isStateParams(value: unknown): value is StateParams {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class StateManager {
  private readonly states: ReadonlySet<string>;
  private readonly usersCollection: string;
  private readonly idColumn: string;
  private readonly stateColumn: string;
  private readonly paramsColumn: string;
  readonly freeState: string;
  readonly withParams: boolean;

  constructor(
    private readonly storage: Storage,
    states: string[],
    options: StateManagerOptions = {}
  ) {
    this.states = new Set(states);
    this.usersCollection = options.usersCollection ?? 'Users';
    this.idColumn = options.idColumn ?? '_id';
    this.stateColumn = options.stateColumn ?? 'State';
    this.paramsColumn = options.paramsColumn ?? 'State_Params';
    this.freeState = options.freeState ?? 'free';
    this.withParams = options.withParams ?? false;
  }

  getStates(): string[] {
    return [...this.states];
  }

  isKnownState(state: string): boolean {
    return state === this.freeState || this.states.has(state);
  }

  /**
   * @throws StateError when the user has no record
   */
  async getState(userId: number): Promise<string> {
    const found = await this.storage.getDataByColumn(this.usersCollection, this.idColumn, userId, {
      columns: [this.stateColumn]
    });
    if (found.length === 0) {
      throw new StateError('User was not found!', { context: { userId } });
    }

    const state = found[0][this.stateColumn];
    return typeof state === 'string' ? state : this.freeState;
  }

  /**
   * Parameters stored with the current state; an empty object when none were stored
   */
  async getStateParams(userId: number): Promise<StateParams> {
    if (!this.withParams) {
      throw new StateError('Class was initialized with no params');
    }

    const found = await this.storage.getDataByColumn(this.usersCollection, this.idColumn, userId, {
      columns: [this.paramsColumn]
    });
    if (found.length === 0) {
      throw new StateError('User was not found!', { context: { userId } });
    }

    const params = found[0][this.paramsColumn];
    return isStateParams(params) ? params : {};
  }

  async isFree(userId: number): Promise<boolean> {
    return (await this.getState(userId)) === this.freeState;
  }

  async setState(userId: number, state: string, params?: StateParams): Promise<void> {
    if (!this.isKnownState(state)) {
      throw new StateError(`Unknown state: ${state}`, { context: { userId, state } });
    }
    if (params !== undefined && !this.withParams) {
      throw new StateError('Class was initialized with no params', { context: { userId, state } });
    }

    const document: Record<string, unknown> = { [this.stateColumn]: state };
    if (this.withParams) {
      document[this.paramsColumn] = params ?? {};
    }

    try {
      await this.storage.updateOne(this.usersCollection, this.idColumn, userId, document);
    } catch (error) {
      LogEngine.error('Failed to change user state', {
        userId,
        state,
        error: getErrorMessage(error)
      });
      throw new StateError(`Failed to change ${userId}'s state to ${state}`, {
        context: { userId, state },
        cause: error
      });
    }

    LogEngine.debug('User state changed', { userId, state });
  }

  async setFree(userId: number): Promise<void> {
    await this.setState(userId, this.freeState, this.withParams ? {} : undefined);
  }
}
