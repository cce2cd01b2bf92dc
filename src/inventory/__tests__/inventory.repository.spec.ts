import { Test, TestingModule } from '@nestjs/testing';
import {
  existsSync,
  mkdirSync,
  mkdtempSync,
  readFileSync,
  readdirSync,
  rmSync,
  writeFileSync,
} from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import ledgerConfig, { LedgerConfig } from '../../config/ledger.config';
import { PersistenceError } from '../errors/ledger.errors';
import { HistoryRepository } from '../history.repository';
import { InventoryRepository, isMissingFile } from '../inventory.repository';
import { StockItem } from '../interface/stock-item.interface';
import { LedgerService } from '../ledger.service';
import { LedgerLoggerService } from '../logging/ledger-logger.service';
import { TransactionLogService } from '../transaction-log.service';
import { buildTestConfig, captureError, createMockLogger } from './test-config';

describe('file repositories', () => {
  let dataDir: string;
  let config: LedgerConfig;
  let repository: InventoryRepository;
  let history: HistoryRepository;
  let ledger: LedgerService;
  const mockLogger = createMockLogger();

  const tea: StockItem = {
    id: 5,
    name: 'Green Tea',
    category: 'Beverages',
    quantity: 12,
    lastPrice: 1.5,
    createdAt: new Date(1_750_000_000_000),
  };

  async function build(overrides: Partial<LedgerConfig> = {}) {
    config = { ...buildTestConfig(dataDir), ...overrides };
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        InventoryRepository,
        HistoryRepository,
        TransactionLogService,
        LedgerService,
        { provide: LedgerLoggerService, useValue: mockLogger },
        { provide: ledgerConfig.KEY, useValue: config },
      ],
    }).compile();

    repository = module.get<InventoryRepository>(InventoryRepository);
    history = module.get<HistoryRepository>(HistoryRepository);
    ledger = module.get<LedgerService>(LedgerService);
  }

  beforeEach(async () => {
    jest.resetAllMocks();
    dataDir = mkdtempSync(join(tmpdir(), 'stock-ledger-'));
    await build();
  });

  afterEach(() => {
    rmSync(dataDir, { recursive: true, force: true });
  });

  describe('InventoryRepository', () => {
    it('should start empty when no files exist', () => {
      expect(repository.loadSnapshot()).toEqual([]);
      expect(repository.loadRevenue()).toBe(0);
    });

    it('should write the snapshot and read it back', () => {
      repository.saveSnapshot([tea]);

      expect(readFileSync(config.stockFile, 'utf8')).toBe(
        '5\nGreen Tea\nBeverages\n12\n1.5\n1750000000\n',
      );
      expect(repository.loadSnapshot()).toEqual([tea]);
      expect(readdirSync(dataDir)).toEqual(['stock.dat']);
    });

    it('should keep the valid records of a damaged snapshot and warn', () => {
      writeFileSync(config.stockFile, '5\nGreen Tea\nBeverages\n12\n1.5\n1750000000\n6\nMug\n');

      expect(repository.loadSnapshot()).toEqual([tea]);
      expect(mockLogger.warn).toHaveBeenCalledWith(
        `Stopped reading ${config.stockFile} at record 1 (partial record); kept 1 items`,
        'InventoryRepository',
      );
    });

    it('should round-trip the revenue total', () => {
      repository.saveRevenue(42.75);

      expect(readFileSync(config.revenueFile, 'utf8')).toBe('42.75');
      expect(repository.loadRevenue()).toBe(42.75);
    });

    it('should read an unreadable revenue value as zero', () => {
      writeFileSync(config.revenueFile, 'lots\n');

      expect(repository.loadRevenue()).toBe(0);
      expect(mockLogger.warn).toHaveBeenCalledWith(
        `Ignoring unreadable revenue value "lots" in ${config.revenueFile}`,
        'InventoryRepository',
      );
    });

    it('should commit snapshot and revenue together without leaving staged files', () => {
      repository.commitState([tea], 9);

      expect(repository.loadSnapshot()).toEqual([tea]);
      expect(repository.loadRevenue()).toBe(9);
      expect(readdirSync(dataDir).sort()).toEqual(['grand_total.dat', 'stock.dat']);
    });

    it('should leave the snapshot untouched when the revenue cannot be staged', async () => {
      repository.saveSnapshot([tea]);
      await build({ revenueFile: join(dataDir, 'missing', 'grand_total.dat') });

      const error = captureError(() =>
        repository.commitState([{ ...tea, quantity: 2 }], 15),
      );

      expect(error).toBeInstanceOf(PersistenceError);
      expect(repository.loadSnapshot()).toEqual([tea]);
      expect(readdirSync(dataDir)).toEqual(['stock.dat']);
    });

    it('should report a write into a missing directory as a persistence error', async () => {
      await build({ stockFile: join(dataDir, 'missing', 'stock.dat') });

      const error = captureError(() => repository.saveSnapshot([tea]));

      expect(error).toBeInstanceOf(PersistenceError);
      expect(error).toMatchObject({
        code: 'PersistenceFailed',
        context: { path: join(dataDir, 'missing', 'stock.dat'), operation: 'write' },
      });
    });
  });

  describe('HistoryRepository', () => {
    it('should return no lines when the file does not exist', () => {
      expect(history.readLines()).toEqual([]);
    });

    it('should append one line per call and skip blank lines on read', () => {
      history.appendLine('[2026-03-01 10:00:00] SYSTEM: Stock data loaded (0 items)');
      history.appendLine('[2026-03-01 10:01:00] ADD: Added Green Tea');

      expect(readFileSync(config.historyFile, 'utf8')).toBe(
        '[2026-03-01 10:00:00] SYSTEM: Stock data loaded (0 items)\n' +
          '[2026-03-01 10:01:00] ADD: Added Green Tea\n',
      );
      expect(history.readLines()).toEqual([
        '[2026-03-01 10:00:00] SYSTEM: Stock data loaded (0 items)',
        '[2026-03-01 10:01:00] ADD: Added Green Tea',
      ]);
    });

    it('should wrap append failures in a persistence error', async () => {
      await build({ historyFile: join(dataDir, 'missing', 'history.log') });

      const error = captureError(() => history.appendLine('line'));

      expect(error).toBeInstanceOf(PersistenceError);
      expect(existsSync(join(dataDir, 'missing'))).toBe(false);
    });
  });

  describe('isMissingFile', () => {
    it('should recognise ENOENT on any error-like object', () => {
      expect(isMissingFile({ code: 'ENOENT', message: 'no such file' })).toBe(true);
      expect(isMissingFile(Object.assign(new Error('gone'), { code: 'ENOENT' }))).toBe(true);
    });

    it.each([[{ code: 'EACCES' }], [new Error('ENOENT')], [null], ['ENOENT']])(
      'should not treat %p as a missing file',
      (error) => {
        expect(isMissingFile(error)).toBe(false);
      },
    );
  });

  describe('LedgerService on disk', () => {
    it('should reload every item after a session, up to the largest safe id and quantity', async () => {
      ledger.open();
      expect(
        captureError(() =>
          ledger.addItem({ id: 1e21, name: 'Big', category: 'Other', quantity: 1, price: 1 }),
        ),
      ).toMatchObject({ code: 'InvalidID' });
      ledger.addItem({
        id: Number.MAX_SAFE_INTEGER,
        name: 'Big',
        category: 'Other',
        quantity: Number.MAX_SAFE_INTEGER,
        price: 1,
      });
      ledger.addItem({ id: 2, name: 'Small', category: 'Other', quantity: 3, price: 0.5 });
      ledger.close();

      await build();
      ledger.open();

      expect(ledger.list().map((item) => [item.id, item.name, item.quantity])).toEqual([
        [Number.MAX_SAFE_INTEGER, 'Big', Number.MAX_SAFE_INTEGER],
        [2, 'Small', 3],
      ]);
      expect(mockLogger.warn).not.toHaveBeenCalled();
    });

    it('should open with an empty history when the history file cannot be read', () => {
      mkdirSync(config.historyFile);

      const report = ledger.open();

      expect(report.consistent).toBe(true);
      expect(mockLogger.warn).toHaveBeenCalledWith(
        expect.stringContaining(
          `Activity log not read, starting with an empty history: Failed to read ${config.historyFile}`,
        ),
        'TransactionLogService',
      );

      const outcome = ledger.addItem({ id: 3, name: 'Salt', category: 'Other', quantity: 4, price: 0.3 });

      expect(outcome.auditWarning).toEqual(
        expect.stringContaining('Change saved, but the activity log was not updated'),
      );
      expect(ledger.list().map((item) => item.id)).toEqual([3]);
    });
  });
});
