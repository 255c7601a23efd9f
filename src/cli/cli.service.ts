import { Inject, Injectable, Logger } from '@nestjs/common';
import { APP_CONFIG, AppConfig } from '../config/app.config';
import { ProviderError, StaleRateError, isWalletError } from '../common/errors/wallet.errors';
import { CurrencyCatalogService } from '../currency/currency-catalog.service';
import { ShowPortfolioDto } from '../portfolio/dto/show-portfolio.dto';
import { TradeDto } from '../portfolio/dto/trade.dto';
import { TradeResult, TradeSide } from '../portfolio/entities/trade.entity';
import { PortfolioQueryService } from '../portfolio/portfolio-query.service';
import { PortfolioService } from '../portfolio/portfolio.service';
import { GetRateDto, ShowHistoryDto, ShowRatesDto, UpdateRatesDto } from '../rates/dto/rate-query.dto';
import { RatePair } from '../rates/entities/rate-pair.entity';
import { RateRecord } from '../rates/entities/rate-record.entity';
import { RateManagerService } from '../rates/rate-manager.service';
import { CredentialsDto } from '../users/dto/credentials.dto';
import { SessionService } from '../users/session.service';
import { UsersService } from '../users/users.service';
import { UsageError, parseArgs } from './cli-args';
import {
  formatPair,
  formatPortfolio,
  formatRate,
  formatReceipt,
  formatRecord,
  formatRefreshReport,
} from './cli-format';
import { CliOutput } from './cli-output';
import { validateFlags } from './validate-flags';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

const DEFAULT_HISTORY_LIMIT = 20;

type CommandHandler = (flags: Record<string, string>) => Promise<number>;

const USAGE = [
  'Usage: wallet <command> [--flag value]',
  '',
  'Commands:',
  '  register        --username <name> --password <password>',
  '  login           --username <name> --password <password>',
  '  logout',
  '  show-portfolio  [--base <code>]',
  '  deposit         --currency <code> --amount <n>',
  '  buy             --currency <code> --amount <n>',
  '  sell            --currency <code> --amount <n>',
  '  get-rate        --from <code> --to <code>',
  '  update-rates    [--source coingecko|exchangerate]',
  '  show-rates      [--top <n>] [--currency <code>]',
  '  show-history    [--currency <code>] [--limit <n>]',
  '  help',
];

/**
 * Command dispatch for the `wallet` binary.
 * Exit codes: 0 success (a partial refresh included), 1 domain error,
 * 2 usage error. Domain errors print as `Kind: message` on stderr.
 */
@Injectable()
export class CliService {
  private readonly logger = new Logger(CliService.name);
  private readonly commands: Record<string, CommandHandler>;
  private readonly precisionOf = (code: string): number => this.catalog.precisionOf(code);

  constructor(
    private readonly users: UsersService,
    private readonly session: SessionService,
    private readonly trades: PortfolioService,
    private readonly query: PortfolioQueryService,
    private readonly rates: RateManagerService,
    private readonly catalog: CurrencyCatalogService,
    private readonly output: CliOutput,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
  ) {
    this.commands = {
      register: (flags) => this.register(flags),
      login: (flags) => this.login(flags),
      logout: () => this.logout(),
      'show-portfolio': (flags) => this.showPortfolio(flags),
      deposit: (flags) => this.trade(TradeSide.DEPOSIT, flags),
      buy: (flags) => this.trade(TradeSide.BUY, flags),
      sell: (flags) => this.trade(TradeSide.SELL, flags),
      'get-rate': (flags) => this.getRate(flags),
      'update-rates': (flags) => this.updateRates(flags),
      'show-rates': (flags) => this.showRates(flags),
      'show-history': (flags) => this.showHistory(flags),
      help: () => this.help(),
    };
  }

  /** Runs one command line (without the node/script prefix) and returns the exit code */
  async run(argv: string[]): Promise<number> {
    try {
      const { command, flags } = parseArgs(argv);
      const name = command ?? 'help';
      const handler = Object.prototype.hasOwnProperty.call(this.commands, name) ? this.commands[name] : undefined;
      if (!handler) {
        throw new UsageError(`Unknown command '${name}'`);
      }
      this.logger.debug({ action: 'COMMAND', command: name });
      return await handler(flags);
    } catch (error) {
      return this.fail(error);
    }
  }

  private fail(error: unknown): number {
    if (error instanceof UsageError) {
      this.output.err(`UsageError: ${error.message}`);
      this.output.err("Run 'wallet help' for usage.");
      return EXIT_USAGE;
    }
    if (isWalletError(error)) {
      this.output.err(`${error.kind}: ${error.message}`);
      return EXIT_FAILURE;
    }
    throw error;
  }

  private async register(flags: Record<string, string>): Promise<number> {
    const dto = await validateFlags(CredentialsDto, flags);
    const user = await this.users.register(dto.username, dto.password);
    this.output.out(`Registered '${user.username}' (id=${user.userId}).`);
    this.output.out(`Log in with: wallet login --username ${user.username} --password <password>`);
    return EXIT_OK;
  }

  private async login(flags: Record<string, string>): Promise<number> {
    const dto = await validateFlags(CredentialsDto, flags);
    const user = await this.session.login(dto.username, dto.password);
    this.output.out(`Logged in as '${user.username}'.`);
    return EXIT_OK;
  }

  private async logout(): Promise<number> {
    await this.session.logout();
    this.output.out('Logged out.');
    return EXIT_OK;
  }

  private async showPortfolio(flags: Record<string, string>): Promise<number> {
    const dto = await validateFlags(ShowPortfolioDto, flags);
    const user = await this.session.requireUser();
    const view = await this.query.getPortfolio(user.userId, dto.base);
    this.print(formatPortfolio(view, user.username, this.precisionOf));
    return EXIT_OK;
  }

  private async trade(side: TradeSide, flags: Record<string, string>): Promise<number> {
    const dto = await validateFlags(TradeDto, flags);
    const user = await this.session.requireUser();
    // the raw flag keeps every digit the user typed
    const amount = flags.amount;
    const attempt = (): Promise<TradeResult> =>
      this.trades.execute(user.userId, { currency: dto.currency, amount, side });

    let result = await attempt();
    if (result.status === 'rejected' && result.error instanceof StaleRateError) {
      await this.refreshFor(result.error);
      result = await attempt();
    }

    if (result.status === 'rejected') {
      throw result.error;
    }
    this.print(formatReceipt(result.receipt, this.precisionOf));
    return EXIT_OK;
  }

  private async getRate(flags: Record<string, string>): Promise<number> {
    const dto = await validateFlags(GetRateDto, flags);
    let pair: RatePair;
    try {
      pair = await this.rates.getRate(dto.from, dto.to);
    } catch (error) {
      if (!(error instanceof StaleRateError)) {
        throw error;
      }
      await this.refreshFor(error);
      pair = await this.rates.getRate(dto.from, dto.to);
    }

    this.output.out(`Rate ${pair.from}→${pair.to}: ${formatRate(pair.rate)} (updated ${pair.updatedAt}, source ${pair.source})`);
    this.output.out(`Reverse ${pair.to}→${pair.from}: ${formatRate(1 / pair.rate)}`);
    return EXIT_OK;
  }

  private async updateRates(flags: Record<string, string>): Promise<number> {
    const dto = await validateFlags(UpdateRatesDto, flags);
    const report = await this.rates.refresh({ source: dto.source });

    if (report.outcomes.length === 0) {
      this.output.out('No pairs to refresh; check TRACKED_CRYPTO and TRACKED_FIAT.');
      return EXIT_OK;
    }

    this.print(formatRefreshReport(report));
    if (report.updated === 0) {
      const first = report.outcomes.find((o) => o.status === 'failed');
      const reason = first && first.status === 'failed' ? first.error.message : 'no pair updated';
      throw new ProviderError('refresh', `all ${report.failed} pair(s) failed (${reason})`);
    }
    if (report.failed > 0) {
      this.output.err(`Warning: ${report.failed} pair(s) could not be refreshed; see above.`);
    }
    return EXIT_OK;
  }

  private async showRates(flags: Record<string, string>): Promise<number> {
    const dto = await validateFlags(ShowRatesDto, flags);
    const listing = await this.rates.listRates({ currency: dto.currency, top: dto.top });

    if (listing.pairs.length === 0) {
      this.output.out(
        dto.currency
          ? `No cached rates for '${dto.currency.toUpperCase()}'.`
          : "Rates cache is empty. Run 'wallet update-rates'.",
      );
      return EXIT_OK;
    }

    this.output.out(`Rates (last refresh: ${listing.lastRefresh ?? 'never'}):`);
    this.print(listing.pairs.map((p) => `  ${formatPair(p)}${this.rates.isFresh(p) ? '' : '  (stale)'}`));
    return EXIT_OK;
  }

  private async showHistory(flags: Record<string, string>): Promise<number> {
    const dto = await validateFlags(ShowHistoryDto, flags);
    const limit = dto.limit ?? DEFAULT_HISTORY_LIMIT;

    // newest `limit` entries, printed oldest first
    const recent: RateRecord[] = [];
    for await (const record of this.rates.history({ currency: dto.currency?.toUpperCase() })) {
      recent.push(record);
      if (recent.length > limit) {
        recent.shift();
      }
    }

    if (recent.length === 0) {
      this.output.out('No rate history yet.');
      return EXIT_OK;
    }
    this.print(recent.map((r) => `  ${formatRecord(r)}`));
    return EXIT_OK;
  }

  private async help(): Promise<number> {
    this.print(USAGE);
    this.output.out('');
    this.output.out(`Base currency: ${this.config.baseCurrency}. Rates expire after ${this.config.ratesTtlSeconds}s.`);
    return EXIT_OK;
  }

  // One refresh before the single retry of a stale lookup
  private async refreshFor(stale: StaleRateError): Promise<void> {
    this.output.err(`Rate ${stale.from}→${stale.to} is not fresh; refreshing rates...`);
    const report = await this.rates.refresh();
    if (report.failed > 0) {
      this.logger.warn({ action: 'AUTO_REFRESH', updated: report.updated, failed: report.failed });
    }
  }

  private print(lines: string[]): void {
    for (const line of lines) {
      this.output.out(line);
    }
  }
}
