import { Inject, Injectable, Logger } from '@nestjs/common';
import { Either, left, right, tryCatchAsync } from '@application/common';
import { ChatReplyDto, UpdateContextDto } from '@application/dtos';
import {
  CocktailLookupError,
  CocktailNotFoundError,
  CocktailServiceError,
  CommandError,
  UnexpectedError,
  UsageError,
} from '@application/errors';
import { ICocktailCatalogPort, IDispatchCommandPort } from '@application/ports';
import { CocktailReplyFormatter } from '@application/services';
import { Cocktail } from '@domain/entities';
import { CallbackAction, ChatCommand, CocktailId, CocktailSummary } from '@domain/value-objects';

/**
 * DispatchCommandUseCase maps chat commands and button presses to catalog
 * lookups and formats the outcome.
 *
 * Each call is an independent unit of work: nothing is remembered between
 * updates except what a button's callback data carries. Every handler makes
 * at most one catalog call, and failures are folded into a reply:
 * - UsageError: the command's usage hint, no catalog call
 * - CocktailNotFoundError: a "no results" reply
 * - CocktailServiceError / UnexpectedError: the generic "try again" reply, logged
 */
@Injectable()
export class DispatchCommandUseCase implements IDispatchCommandPort {
  private readonly logger = new Logger(DispatchCommandUseCase.name);

  constructor(
    @Inject('ICocktailCatalog')
    private readonly catalog: ICocktailCatalogPort,
    private readonly formatter: CocktailReplyFormatter,
  ) {}

  async handleCommand(command: ChatCommand, context: UpdateContextDto): Promise<ChatReplyDto> {
    this.logger.log(`User ${context.userId ?? 'unknown'} sent /${this.commandName(command)}`);

    try {
      return await this.dispatchCommand(command, context);
    } catch (error) {
      return this.replyForError(new UnexpectedError(describe(error)), context);
    }
  }

  async handleCallback(action: CallbackAction, context: UpdateContextDto): Promise<ChatReplyDto> {
    this.logger.log(
      `User ${context.userId ?? 'unknown'} pressed ${
        action.kind === 'lookup' ? `lookup:${action.cocktailId.toString()}` : 'random'
      }`,
    );

    try {
      const result = await this.dispatchCallback(action);
      return this.unwrap(result, action.kind, context);
    } catch (error) {
      return this.replyForError(new UnexpectedError(describe(error)), context);
    }
  }

  // ============ Dispatch ============

  private async dispatchCommand(
    command: ChatCommand,
    context: UpdateContextDto,
  ): Promise<ChatReplyDto> {
    switch (command.kind) {
      case 'start':
        return this.formatter.welcome();
      case 'help':
        return this.formatter.help();
      case 'unknown':
        return this.formatter.unknownCommand();
      case 'random':
        return this.unwrap(await this.randomCocktail(), 'random', context);
      case 'search':
        return this.unwrap(await this.searchByName(command.query), 'search', context);
      case 'ingredient':
        return this.unwrap(await this.filterByIngredient(command.ingredient), 'ingredient', context);
      default:
        return assertNever(command);
    }
  }

  private async dispatchCallback(
    action: CallbackAction,
  ): Promise<Either<CocktailLookupError, ChatReplyDto>> {
    switch (action.kind) {
      case 'random':
        return this.randomCocktail();
      case 'lookup':
        return this.lookupById(action.cocktailId);
      default:
        return assertNever(action);
    }
  }

  // ============ Handlers ============

  private async randomCocktail(): Promise<Either<CocktailLookupError, ChatReplyDto>> {
    const result = await this.callCatalog('random', () => this.catalog.getRandom());
    if (result.isLeft()) {
      return result;
    }
    if (!result.value) {
      return left(new CocktailNotFoundError('random'));
    }
    return right(this.formatter.formatCocktail(result.value));
  }

  private async lookupById(id: CocktailId): Promise<Either<CocktailLookupError, ChatReplyDto>> {
    const result = await this.callCatalog('lookup', () => this.catalog.lookupById(id));
    if (result.isLeft()) {
      return result;
    }
    if (!result.value) {
      return left(new CocktailNotFoundError(id.toString()));
    }
    return right(this.formatter.formatCocktail(result.value));
  }

  private async searchByName(query: string | null): Promise<Either<CommandError, ChatReplyDto>> {
    if (!query) {
      return left(new UsageError('search'));
    }

    const result = await this.callCatalog('search', () => this.catalog.searchByName(query));
    if (result.isLeft()) {
      return result;
    }

    const [first, ...others] = result.value;
    if (!first) {
      return left(new CocktailNotFoundError(query));
    }
    return right(this.formatter.formatSearchResults([first, ...others]));
  }

  private async filterByIngredient(
    ingredient: string | null,
  ): Promise<Either<CommandError, ChatReplyDto>> {
    if (!ingredient) {
      return left(new UsageError('ingredient'));
    }

    const result = await this.callCatalog<CocktailSummary[]>('filter', () =>
      this.catalog.filterByIngredient(ingredient),
    );
    if (result.isLeft()) {
      return result;
    }
    if (result.value.length === 0) {
      return left(new CocktailNotFoundError(ingredient));
    }
    return right(this.formatter.formatIngredientMatches(ingredient, result.value));
  }

  // ============ Private Helper Methods ============

  private callCatalog<T extends Cocktail | Cocktail[] | CocktailSummary[] | null>(
    operation: string,
    call: () => Promise<T>,
  ): Promise<Either<CocktailServiceError | UnexpectedError, T>> {
    return tryCatchAsync(call, (error) =>
      error instanceof CocktailServiceError
        ? error
        : new UnexpectedError(`${operation}: ${describe(error)}`),
    );
  }

  private unwrap(
    result: Either<CommandError, ChatReplyDto>,
    source: LookupSource,
    context: UpdateContextDto,
  ): ChatReplyDto {
    if (result.isRight()) {
      return result.value;
    }

    const error = result.value;
    if (error instanceof UsageError) {
      return this.formatter.usage(error.command);
    }
    if (error instanceof CocktailNotFoundError) {
      return this.notFoundReply(source, error.query);
    }
    return this.replyForError(error, context);
  }

  private notFoundReply(source: LookupSource, query: string): ChatReplyDto {
    switch (source) {
      case 'random':
        return this.formatter.randomUnavailable();
      case 'search':
        return this.formatter.noSearchResults(query);
      case 'ingredient':
        return this.formatter.noIngredientResults(query);
      case 'lookup':
        return this.formatter.lookupUnavailable();
    }
  }

  private replyForError(
    error: CocktailServiceError | UnexpectedError,
    context: UpdateContextDto,
  ): ChatReplyDto {
    this.logger.error(
      `${error.code} while handling update from chat ${context.chatId ?? 'unknown'}: ${
        error.message
      }`,
    );
    return this.formatter.serviceUnavailable();
  }

  private commandName(command: ChatCommand): string {
    return command.kind === 'unknown' ? command.name : command.kind;
  }
}

type LookupSource = 'random' | 'search' | 'ingredient' | 'lookup';

function describe(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
}
