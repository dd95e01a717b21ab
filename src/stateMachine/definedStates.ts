// src/stateMachine/definedStates.ts

export enum GwdToPngStates {
    INIT = 'INIT',
    READ_INPUT = 'READ_INPUT',
    DECODE = 'DECODE',
    REORDER_CHANNELS = 'REORDER_CHANNELS',
    WRITE_OUTPUT = 'WRITE_OUTPUT',
    COMPLETED = 'COMPLETED',
    ERROR = 'ERROR',
}

export enum PngToGwdStates {
    INIT = 'INIT',
    LOAD_IMAGE = 'LOAD_IMAGE',
    ENCODE = 'ENCODE',
    WRITE_OUTPUT = 'WRITE_OUTPUT',
    COMPLETED = 'COMPLETED',
    ERROR = 'ERROR',
}
