/**
 * INFRASTRUCTURE LAYER
 *
 * Framework and network code that plugs the application into the outside world.
 *
 * Contains:
 * - Adapters: implementations of application ports (TheCocktailDB catalog)
 * - Telegram: telegraf transport feeding the dispatcher
 * - Config: validated environment
 * - Observability: pino logging
 *
 * Rules:
 * - CAN import from domain and application layers
 * - Implements interfaces defined in application/ports
 */

export * from './adapters';
export * from './config';
export * from './observability';
export * from './telegram';
