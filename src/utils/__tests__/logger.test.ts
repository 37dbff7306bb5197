/**
 * @fileoverview Tests for the tagged logger.
 * @module utils/__tests__/logger.test
 */

import { createTaggedLogger } from '../logger';
import { createMockLogger } from '../../__tests__/mocks/media';

describe('createTaggedLogger', () => {
    it('prefixes every level with the tag', () => {
        const base = createMockLogger();
        const log = createTaggedLogger('ScheduleCache', base);

        log.info('built');
        log.warn('slow', 42);
        log.error('failed');
        log.debug?.('detail');

        expect(base.info).toHaveBeenCalledWith('[ScheduleCache] built');
        expect(base.warn).toHaveBeenCalledWith('[ScheduleCache] slow', 42);
        expect(base.error).toHaveBeenCalledWith('[ScheduleCache] failed');
        expect(base.debug).toHaveBeenCalledWith('[ScheduleCache] detail');
    });

    it('tolerates a base logger without debug', () => {
        const base = { info: jest.fn(), warn: jest.fn(), error: jest.fn() };
        const log = createTaggedLogger('X', base);
        expect(() => log.debug?.('ignored')).not.toThrow();
    });
});
