/**
 * @fileoverview Unit tests for Logger and ComponentLogger
 */

import { suite, test, setup, teardown } from 'mocha';
import * as assert from 'assert';
import * as sinon from 'sinon';
import { Logger } from '../../../core/logger';
import { StaticConfigProvider } from '../../../core/configProviders';

suite('Logger', () => {
  let consoleStubs: {
    log: sinon.SinonStub;
    debug: sinon.SinonStub;
    warn: sinon.SinonStub;
    error: sinon.SinonStub;
  };

  setup(() => {
    Logger.reset();
    consoleStubs = {
      log: sinon.stub(console, 'log'),
      debug: sinon.stub(console, 'debug'),
      warn: sinon.stub(console, 'warn'),
      error: sinon.stub(console, 'error'),
    };
  });

  teardown(() => {
    Object.values(consoleStubs).forEach(stub => stub.restore());
    Logger.reset();
  });

  test('defaults to info level', () => {
    const logger = new Logger();

    logger.debug('jobs', 'hidden');
    logger.info('jobs', 'shown');

    assert.strictEqual(logger.getLevel(), 'info');
    assert.ok(consoleStubs.debug.notCalled);
    assert.ok(consoleStubs.log.calledOnce);
  });

  test('formats the line with level and component', () => {
    new Logger().warn('reaper', 'careful');
    assert.match(String(consoleStubs.warn.firstCall.args[0]), /^\S+ WARN  \[JobEngine:reaper\] careful$/);
  });

  test('passes structured data as a second argument', () => {
    const data = { jobId: 'job-1' };
    new Logger().error('job-runner', 'failed', data);
    assert.strictEqual(consoleStubs.error.firstCall.args[1], data);
  });

  test('reads the level from config', () => {
    const logger = new Logger(new StaticConfigProvider({ 'jobEngine.logging.level': 'warn' }));

    logger.info('jobs', 'hidden');
    logger.warn('jobs', 'shown');

    assert.ok(consoleStubs.log.notCalled);
    assert.ok(consoleStubs.warn.calledOnce);
  });

  test('ignores an unknown level', () => {
    const logger = new Logger(new StaticConfigProvider({ 'jobEngine.logging.level': 'loud' }));
    assert.strictEqual(logger.getLevel(), 'info');
  });

  test('debug output needs the debug level and the component switch', () => {
    const logger = new Logger(new StaticConfigProvider({
      'jobEngine.logging.level': 'debug',
      'jobEngine.logging.debug.reaper': true,
    }));

    assert.ok(logger.isDebugEnabled('reaper'));
    assert.ok(!logger.isDebugEnabled('jobs'));

    logger.debug('jobs', 'hidden');
    logger.debug('reaper', 'shown');
    assert.ok(consoleStubs.debug.calledOnce);

    logger.enableDebug('jobs');
    assert.ok(logger.isDebugEnabled('jobs'));
    logger.enableDebug('jobs', false);
    assert.ok(!logger.isDebugEnabled('jobs'));
  });

  test('setConfigProvider reloads the configuration', () => {
    const logger = new Logger();
    logger.setConfigProvider(new StaticConfigProvider({ 'jobEngine.logging.level': 'error' }));
    assert.strictEqual(logger.getLevel(), 'error');
  });

  test('initialize installs one process-wide logger', () => {
    const first = Logger.initialize();
    const second = Logger.initialize(new StaticConfigProvider({ 'jobEngine.logging.level': 'error' }));

    assert.strictEqual(first, second);
    assert.strictEqual(Logger.current(), first);
  });

  suite('ComponentLogger', () => {
    test('uses the logger installed after it was created', () => {
      const log = Logger.for('engine');
      Logger.initialize(new StaticConfigProvider({ 'jobEngine.logging.level': 'error' }));

      log.warn('hidden');
      log.error('shown');

      assert.ok(consoleStubs.warn.notCalled);
      assert.match(String(consoleStubs.error.firstCall.args[0]), /\[JobEngine:engine\] shown$/);
      assert.strictEqual(log.getLevel(), 'error');
    });

    test('falls back to an info logger when none is installed', () => {
      const log = Logger.for('jobs');
      log.info('shown');
      assert.ok(consoleStubs.log.calledOnce);
      assert.ok(!log.isDebugEnabled());
    });
  });
});
