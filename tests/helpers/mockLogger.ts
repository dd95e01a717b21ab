import type { ILogger } from '../../src/@types/index.ts';

export class MockLogger implements ILogger {
    readonly name = 'mock';
    infoMessages: string[] = [];
    warnMessages: string[] = [];
    errorMessages: string[] = [];
    debugMessages: string[] = [];
    verbose: boolean;

    constructor(verbose: boolean = false) {
        this.verbose = verbose;
    }

    info(message: string): void {
        this.infoMessages.push(message);
    }
    success(_message: string): void {}
    warn(message: string): void {
        this.warnMessages.push(message);
    }
    error(message: string): void {
        this.errorMessages.push(message);
    }
    debug(message: string): void {
        this.debugMessages.push(message);
    }
}
