import { Injectable } from '@nestjs/common';

import { ThresholdArgsError, type ThresholdArgsParseResult } from './telegram-parser.interfaces';
import { SUPPORTED_COMMAND_MAP } from './telegram.constants';
import type { ParsedMessageCommand, SupportedTelegramCommand } from './telegram.interfaces';
import { parseThresholdValue } from '../config/app-config.parsers';
import { type NetworkKey, parseNetworkKey } from '../core/networks/network-key.interfaces';
import type { INetworkThreshold } from '../core/transactions/transaction.interfaces';

const THRESHOLD_UNIT_TOKENS: ReadonlySet<string> = new Set<string>(['native', 'usd']);

@Injectable()
export class TelegramParserService {
  /**
   * One command per line. Lines that do not start with `/` and unknown commands are
   * ignored; a `@botname` suffix on the command token is dropped.
   */
  public parseMessageCommands(rawText: string): readonly ParsedMessageCommand[] {
    const lines: readonly string[] = rawText.split(/\r?\n/);
    const parsedCommands: ParsedMessageCommand[] = [];

    for (let lineIndex: number = 0; lineIndex < lines.length; lineIndex += 1) {
      const rawLine: string = lines[lineIndex]?.trim() ?? '';

      if (!rawLine.startsWith('/')) {
        continue;
      }

      const parsedCommand: ParsedMessageCommand | null = this.parseCommandLine(
        rawLine,
        lineIndex + 1,
      );

      if (parsedCommand !== null) {
        parsedCommands.push(parsedCommand);
      }
    }

    return parsedCommands;
  }

  public parseThresholdArgs(args: readonly string[]): ThresholdArgsParseResult {
    const rawNetwork: string | undefined = args[0];
    const rawValue: string | undefined = args[1];
    const rawUnit: string | undefined = args[2];

    if (rawNetwork === undefined || rawValue === undefined || args.length > 3) {
      return { ok: false, error: ThresholdArgsError.USAGE, rawValue: null };
    }

    const networkKey: NetworkKey | null = parseNetworkKey(rawNetwork);

    if (networkKey === null) {
      return { ok: false, error: ThresholdArgsError.UNKNOWN_NETWORK, rawValue: rawNetwork };
    }

    if (rawUnit !== undefined && !THRESHOLD_UNIT_TOKENS.has(rawUnit.toLowerCase())) {
      return { ok: false, error: ThresholdArgsError.INVALID_VALUE, rawValue: rawUnit };
    }

    const threshold: INetworkThreshold | null = parseThresholdValue(
      rawUnit === undefined ? rawValue : `${rawValue} ${rawUnit}`,
    );

    if (threshold === null) {
      return { ok: false, error: ThresholdArgsError.INVALID_VALUE, rawValue };
    }

    return { ok: true, networkKey, threshold };
  }

  private parseCommandLine(rawLine: string, lineNumber: number): ParsedMessageCommand | null {
    const parts: readonly string[] = rawLine.split(/\s+/);
    const commandToken: string | undefined = parts[0];

    if (!commandToken) {
      return null;
    }

    const commandBase: string | undefined = commandToken.slice(1).split('@')[0];

    if (!commandBase) {
      return null;
    }

    const command: SupportedTelegramCommand | undefined =
      SUPPORTED_COMMAND_MAP[commandBase.toLowerCase()];

    if (command === undefined) {
      return null;
    }

    return {
      command,
      args: parts.slice(1),
      lineNumber,
    };
  }
}
