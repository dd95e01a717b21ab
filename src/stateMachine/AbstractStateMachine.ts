// src/stateMachine/AbstractStateMachine.ts

import type { ILogger } from '../@types/index.ts';

interface IStateMachineOptions {
    logger: ILogger;
    verbose: boolean;
}

export abstract class AbstractStateMachine<S extends string, O extends IStateMachineOptions> {
    protected state: S;
    protected readonly options: O;
    protected stateTransitions: Array<{ state: S; handler: () => Promise<void> | void }>;

    protected constructor(initialState: S, options: O) {
        this.state = initialState;
        this.options = options;
        this.stateTransitions = [];
    }

    get currentState(): S {
        return this.state;
    }

    /**
     * Runs every handler in `stateTransitions` in order, entering its state first.
     * On failure the machine enters the error state, logs which state failed and rethrows.
     *
     * @return {Promise<void>} Resolves when all handlers have completed.
     */
    async run(): Promise<void> {
        try {
            for (const transition of this.stateTransitions) {
                this.transitionTo(transition.state);
                await transition.handler.call(this);
            }
            this.transitionTo(this.getCompletionState());
        } catch (error) {
            this.handleError(error);
        }
    }

    /**
     * Moves to `nextState`, logging the transition in verbose mode.
     *
     * @param {S} nextState - The state to enter.
     * @return {void}
     */
    protected transitionTo(nextState: S): void {
        const { logger, verbose } = this.options;
        if (verbose) {
            logger.debug(`STATE :: Transitioning from state "${this.state}" -> "${nextState}"`);
        }
        this.state = nextState;
    }

    /**
     * Records the failing state, enters the error state and rethrows the original error.
     *
     * @param {unknown} error - Whatever the failing handler threw.
     * @return {never}
     */
    protected handleError(error: unknown): never {
        const failedState = this.state;
        this.state = this.getErrorState();
        const message = error instanceof Error ? error.message : String(error);
        this.options.logger.error(`Error occurred during "${failedState}": ${message}`);
        throw error;
    }

    protected abstract getCompletionState(): S;
    protected abstract getErrorState(): S;
}
