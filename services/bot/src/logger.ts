import pino from 'pino';
import { config } from './config';

export type Logger = pino.Logger;

export const logger: Logger = pino({ name: 'reddit-telegram-bot', level: config.logLevel });
