import { Logger } from 'winston';

export interface MockLogger {
    logger: Logger;
    warn: jest.Mock;
    debug: jest.Mock;
    info: jest.Mock;
    error: jest.Mock;
}

export function createMockLogger(): MockLogger {
    const mock = {
        warn: jest.fn(),
        debug: jest.fn(),
        info: jest.fn(),
        error: jest.fn(),
    };
    return { ...mock, logger: mock as unknown as Logger };
}
