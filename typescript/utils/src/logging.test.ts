import { expect } from 'chai';
import { pino } from 'pino';

import {
  LogFormat,
  LogLevel,
  configureRootLogger,
  getLogFormat,
  getLogLevel,
  getRootLogger,
  setRootLogger,
  toPinoLevel,
} from './logging.js';

describe('Logging Utilities', () => {
  describe('toPinoLevel', () => {
    it('passes pino levels through', () => {
      expect(toPinoLevel('debug')).to.equal('debug');
      expect(toPinoLevel('silent')).to.equal('silent');
    });

    it('maps off and none to silent', () => {
      expect(toPinoLevel('off')).to.equal('silent');
      expect(toPinoLevel('none')).to.equal('silent');
    });

    it('returns undefined for unknown levels', () => {
      expect(toPinoLevel('loud')).to.be.undefined;
      expect(toPinoLevel(undefined)).to.be.undefined;
    });
  });

  describe('configureRootLogger', () => {
    const original = getRootLogger();

    after(() => {
      setRootLogger(original);
    });

    it('rebuilds the root logger with the new level and format', () => {
      const logger = configureRootLogger(LogFormat.JSON, LogLevel.Off);
      expect(logger.level).to.equal('silent');
      expect(getLogLevel()).to.equal('silent');
      expect(getLogFormat()).to.equal(LogFormat.JSON);
      expect(getRootLogger()).to.equal(logger);
    });

    it('can be replaced with an injected logger', () => {
      const injected = pino({ level: 'silent' });
      expect(setRootLogger(injected)).to.equal(injected);
      expect(getRootLogger()).to.equal(injected);
    });
  });
});
