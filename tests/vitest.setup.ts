import { setGlobalLoggerFactory } from 'global-logger-factory';
import { ConfigurableLoggerFactory } from '../src/logging/ConfigurableLoggerFactory';

setGlobalLoggerFactory(new ConfigurableLoggerFactory('debug', { silent: true }));
