import { createLogger } from '../../src/server/logger.js';

describe('createLogger', () => {
    it('should prefix lines with the tag and pass details through', () => {
        const sink = vi.fn();
        const logger = createLogger('Server', 'info', sink);

        logger.info('hello', 42);

        expect(sink).toHaveBeenCalledWith('[Server] hello', 42);
    });

    it('should drop messages below the level', () => {
        const sink = vi.fn();
        const logger = createLogger('Server', 'error', sink);

        logger.info('info');
        logger.warn('warn');
        logger.error('error');

        expect(sink).toHaveBeenCalledTimes(1);
        expect(sink).toHaveBeenCalledWith('[Server] error');
    });

    it('should show warnings at warn level', () => {
        const sink = vi.fn();
        const logger = createLogger('Server', 'warn', sink);

        logger.info('info');
        logger.warn('warn');

        expect(sink.mock.calls).toEqual([['[Server] warn']]);
    });

    it('should stay quiet when silent', () => {
        const sink = vi.fn();
        const logger = createLogger('Server', 'silent', sink);

        logger.error('nothing');

        expect(sink).not.toHaveBeenCalled();
    });
});
