import { HandlerNotRegisteredError } from '../../core/errors';
import { CommandHandler, MessageType } from '../../core/types/cqrs';

/**
 * Dispatches commands to the handler registered for their class
 */
export class CommandExecutor {
  private readonly handlers = new Map<Function, CommandHandler<any>>();

  register<TCommand>(commandType: MessageType<TCommand>, handler: CommandHandler<TCommand>): this {
    this.handlers.set(commandType, handler);
    return this;
  }

  /**
   * Executes the given command
   */
  async execute<TCommand extends object>(command: TCommand): Promise<void> {
    const handler = this.handlers.get(command.constructor);
    if (!handler) {
      throw new HandlerNotRegisteredError(command.constructor.name);
    }
    await handler.handle(command);
  }
}
