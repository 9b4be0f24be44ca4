import { HandlerNotRegisteredError } from '../../../core/errors';
import { CommandHandler } from '../../../core/types/cqrs';
import { CommandExecutor } from '..';

class RenameCommand {
  constructor(readonly name: string) {}
}

class ArchiveCommand {}

class RenameCommandHandler implements CommandHandler<RenameCommand> {
  readonly names: string[] = [];

  async handle(command: RenameCommand): Promise<void> {
    this.names.push(command.name);
  }
}

describe('CommandExecutor', () => {
  it('should dispatch a command to the handler registered for its class', async () => {
    const handler = new RenameCommandHandler();
    const executor = new CommandExecutor().register(RenameCommand, handler);

    await executor.execute(new RenameCommand('Nordic Traders'));

    expect(handler.names).toEqual(['Nordic Traders']);
  });

  it('should propagate the handler failure', async () => {
    const failure = new Error('rename failed');
    const executor = new CommandExecutor().register(RenameCommand, {
      handle: async () => {
        throw failure;
      }
    });

    await expect(executor.execute(new RenameCommand('Nordic Traders'))).rejects.toBe(failure);
  });

  it('should reject a command without a registered handler', async () => {
    const executor = new CommandExecutor().register(RenameCommand, new RenameCommandHandler());

    await expect(executor.execute(new ArchiveCommand())).rejects.toThrow(
      "No handler registered for 'ArchiveCommand'"
    );
    await expect(executor.execute(new ArchiveCommand())).rejects.toBeInstanceOf(HandlerNotRegisteredError);
  });
});
