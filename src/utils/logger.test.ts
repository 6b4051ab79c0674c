import { describe, expect, it } from 'vitest';
import { silentSink } from '../test/helpers.js';
import { createLogger } from './logger.js';

describe('createLogger', () => {
  it('prefixes lines with the tag and level', () => {
    const sink = silentSink();
    const logger = createLogger({ tag: 'pos-config', sink });

    logger.info('started');
    logger.warn('careful');
    logger.error('failed');

    expect(sink.log).toHaveBeenCalledWith('[pos-config] INFO started');
    expect(sink.warn).toHaveBeenCalledWith('[pos-config] WARN careful');
    expect(sink.error).toHaveBeenCalledWith('[pos-config] ERROR failed');
  });

  it('records debug lines but prints them only when verbose', () => {
    const quietSink = silentSink();
    const quiet = createLogger({ sink: quietSink });
    quiet.debug('details');

    expect(quietSink.log).not.toHaveBeenCalled();
    expect(quiet.entries('debug').map((entry) => entry.message)).toEqual(['details']);

    const loudSink = silentSink();
    createLogger({ sink: loudSink, verbose: true }).debug('details');

    expect(loudSink.log).toHaveBeenCalledWith('[menu] DEBUG details');
  });

  it('keeps entries in order with their level', () => {
    const logger = createLogger({ sink: silentSink() });
    logger.info('one');
    logger.warn('two');

    expect(logger.entries().map(({ level, message }) => [level, message])).toEqual([
      ['info', 'one'],
      ['warn', 'two'],
    ]);
  });
});
