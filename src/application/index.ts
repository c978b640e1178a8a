/**
 * APPLICATION LAYER
 *
 * Turns chat commands and button presses into catalog lookups and replies.
 *
 * Contains:
 * - Use Cases: DispatchCommandUseCase
 * - Services: CocktailReplyFormatter and the fixed bot texts
 * - Ports: Interfaces that define how the application communicates with the outside world
 *   - Inbound: How the transport calls us (IDispatchCommandPort)
 *   - Outbound: How we reach the recipe database (ICocktailCatalogPort)
 * - DTOs: replies handed to the transport
 *
 * Rules:
 * - CAN import from domain layer
 * - CANNOT import from infrastructure layer
 * - Defines interfaces (ports) that infrastructure implements
 */

// Common utilities
export * from './common';

// Error types
export * from './errors';

// DTOs
export * from './dtos';

// Ports (interfaces)
export * from './ports';

// Reply formatting
export * from './services';

// Use cases
export * from './use-cases';
