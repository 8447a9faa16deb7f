import { Logger, LoggerService } from '@nestjs/common';
import { PaymentStatus } from '../domain/enums';
import { UndoError, toEngineError } from '../errors';
import { Clock } from '../interfaces';
import { SystemClock } from '../clock';
import { PaymentCommand, describeCommand } from './payment-command';
import { PaymentOperationResult, failure } from './command.types';

export interface ExecutedCommand {
  command: PaymentCommand;
  result: PaymentOperationResult;
  executedAt: Date;
}

export interface CommandInvokerOptions {
  clock?: Clock;
  logger?: LoggerService;
}

/**
 * Runs commands and remembers the most recent one so it can be undone.
 *
 * The slot holds a single command. It is written once the command has
 * settled, so a command still in flight is never visible to undoLast.
 * undoLast empties the slot before it awaits; a failed undo puts the
 * entry back unless another command has taken the slot meanwhile.
 */
export class CommandInvoker {
  private readonly clock: Clock;
  private readonly logger: LoggerService;
  private last: ExecutedCommand | null = null;

  constructor(options: CommandInvokerOptions = {}) {
    this.clock = options.clock ?? new SystemClock();
    this.logger = options.logger ?? new Logger(CommandInvoker.name);
  }

  /**
   * Rebuild an invoker whose slot holds an earlier execution.
   * A refunded payment leaves the slot empty.
   */
  static fromExecuted(
    command: PaymentCommand,
    options: CommandInvokerOptions = {},
  ): CommandInvoker {
    const invoker = new CommandInvoker(options);
    const payment = command.getPayment();

    if (!payment || payment.status === PaymentStatus.REFUNDED) {
      return invoker;
    }

    const result: PaymentOperationResult =
      payment.status === PaymentStatus.COMPLETED
        ? { success: true, payment }
        : failure(UndoError.notSuccessful(describeCommand(command)), payment);

    invoker.last = {
      command,
      result,
      executedAt: payment.paidAt ?? payment.updatedAt,
    };
    return invoker;
  }

  async execute(command: PaymentCommand): Promise<PaymentOperationResult> {
    const description = describeCommand(command);
    this.logger.debug?.(`Executing ${description}`);

    let result: PaymentOperationResult;
    try {
      result = await command.execute();
    } catch (error) {
      result = failure(toEngineError(error), command.getPayment());
    }

    this.last = { command, result, executedAt: this.clock.now() };

    if (result.success) {
      this.logger.log(`Executed ${description}`);
    } else {
      this.logger.warn(
        `${description} failed [${result.error.code}]: ${result.error.message}`,
      );
    }

    return result;
  }

  async undoLast(): Promise<PaymentOperationResult> {
    const entry = this.last;

    if (!entry) {
      return failure(UndoError.nothingToUndo());
    }

    const description = describeCommand(entry.command);

    if (!entry.result.success) {
      return failure(UndoError.notSuccessful(description), entry.result.payment);
    }

    this.last = null;

    let result: PaymentOperationResult;
    try {
      result = await entry.command.undo();
    } catch (error) {
      result = failure(toEngineError(error), entry.command.getPayment());
    }

    if (result.success) {
      this.logger.log(`Undid ${description}`);
    } else {
      if (this.last === null) {
        this.last = entry;
      }
      this.logger.warn(
        `Undo of ${description} failed [${result.error.code}]: ${result.error.message}`,
      );
    }

    return result;
  }

  getLastCommand(): PaymentCommand | null {
    return this.last?.command ?? null;
  }

  getLastExecution(): ExecutedCommand | null {
    return this.last;
  }

  hasUndoableCommand(): boolean {
    return this.last !== null && this.last.result.success;
  }
}
