import { createChildLogger, logger } from '@stockwatch/shared/src/utils/logger';

describe('Logger', () => {
     it('should be defined', () => {
          expect(logger).toBeDefined();
     });

     it('should have standard logging methods', () => {
          expect(logger.info).toBeDefined();
          expect(logger.error).toBeDefined();
          expect(logger.warn).toBeDefined();
          expect(logger.debug).toBeDefined();
     });

     it('should respect the silent level set for tests', () => {
          expect(logger.level).toBe('silent');
     });

     it('should handle structured logging with objects', () => {
          const spy = jest.spyOn(logger, 'info');
          logger.info({ jobName: 'sell_down', events: 3 }, 'Simulation job completed');
          expect(spy).toHaveBeenCalledWith({ jobName: 'sell_down', events: 3 }, 'Simulation job completed');
          spy.mockRestore();
     });

     describe('createChildLogger', () => {
          it('should carry the bound context', () => {
               const child = createChildLogger({ component: 'shrink-detector' });
               expect(child.bindings()).toMatchObject({ component: 'shrink-detector', service: 'stockwatch' });
               expect(child.level).toBe('silent');
          });
     });
});
