import { Test, TestingModule } from '@nestjs/testing';
import { LogAction } from '../../inventory/events/ledger.events';
import { StockItem } from '../../inventory/interface/stock-item.interface';
import { LedgerCommands } from '../../inventory/ledger.commands';
import { PROMPTER, PromptClosedError, Prompter } from '../prompter';
import { StockShell, parseDecimal, parseWholeNumber } from '../stock-shell';

class ScriptedPrompter implements Prompter {
  readonly questions: string[] = [];
  closed = false;

  constructor(private readonly answers: string[]) {}

  ask(question: string): Promise<string> {
    this.questions.push(question);
    const answer = this.answers.shift();
    return answer === undefined
      ? Promise.reject(new PromptClosedError())
      : Promise.resolve(answer);
  }

  close(): void {
    this.closed = true;
  }
}

describe('StockShell', () => {
  let logSpy: jest.SpyInstance;

  const apple: StockItem = {
    id: 1,
    name: 'Apple',
    category: 'Fruits',
    quantity: 10,
    lastPrice: 2,
    createdAt: new Date(0),
  };

  const mockCommands = {
    sell: jest.fn(),
    add: jest.fn(),
    restock: jest.fn(),
    update: jest.fn(),
    remove: jest.fn(),
    list: jest.fn(),
    overview: jest.fn(),
    findByName: jest.fn(),
    search: jest.fn(),
    lowStock: jest.fn(),
    setThreshold: jest.fn(),
    history: jest.fn(),
    reconcile: jest.fn(),
  };

  async function runWith(answers: string[]): Promise<ScriptedPrompter> {
    const prompter = new ScriptedPrompter(answers);
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        StockShell,
        { provide: LedgerCommands, useValue: mockCommands },
        { provide: PROMPTER, useValue: prompter },
      ],
    }).compile();

    await module.get<StockShell>(StockShell).run();
    return prompter;
  }

  function output(): string[] {
    return logSpy.mock.calls.map((args: unknown[]) => String(args[0]));
  }

  function expectLineContaining(text: string) {
    expect(output()).toEqual(expect.arrayContaining([expect.stringContaining(text)]));
  }

  beforeEach(() => {
    jest.resetAllMocks();
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);

    mockCommands.reconcile.mockReturnValue({
      ok: true,
      data: { consistent: true, snapshotRevenue: 0, loggedRevenue: 0, difference: 0 },
    });
    mockCommands.overview.mockReturnValue({
      ok: true,
      data: {
        itemCount: 1,
        totalQuantity: 10,
        outOfStockCount: 0,
        lowStockCount: 1,
        threshold: 15,
        categories: new Map([['Fruits', 1]]),
        totalRevenue: 0,
      },
    });
    mockCommands.list.mockReturnValue({ ok: true, data: [apple] });
  });

  afterEach(() => {
    logSpy.mockRestore();
  });

  it('should exit on choice 9 and close the prompter', async () => {
    const prompter = await runWith(['9']);

    expect(prompter.questions).toEqual(['Enter your choice: ']);
    expect(prompter.closed).toBe(true);
    expect(output()).toContain('Total Revenue: $0.00 | Items in Stock: 1');
  });

  it('should treat the end of input as exit', async () => {
    const prompter = await runWith([]);

    expect(prompter.closed).toBe(true);
  });

  it('should keep asking until the menu choice is in range', async () => {
    const prompter = await runWith(['12', 'abc', '9']);

    expect(prompter.questions).toEqual([
      'Enter your choice: ',
      'Enter your choice: ',
      'Enter your choice: ',
    ]);
    expect(
      output().filter((line) => line.includes('Please enter a number between 1 and 9.')),
    ).toHaveLength(2);
  });

  it('should warn at startup when revenue and logged sales disagree', async () => {
    mockCommands.reconcile.mockReturnValue({
      ok: true,
      data: { consistent: false, snapshotRevenue: 30, loggedRevenue: 10, difference: 20 },
    });

    await runWith(['9']);

    expectLineContaining('Revenue total $30.00 differs from logged sales of $10.00');
  });

  it('should record a sale and show the session total', async () => {
    mockCommands.sell.mockReturnValue({
      ok: true,
      data: { item: { ...apple, quantity: 6 }, amount: 10, remainingQty: 6, totalRevenue: 10 },
    });

    const prompter = await runWith(['1', '1', '4', '2.5', 'N', '9']);

    expect(mockCommands.sell).toHaveBeenCalledWith({ itemId: 1, quantity: 4, unitPrice: 2.5 });
    expect(prompter.questions).toContain('Enter price per unit (last: $2.00): $');
    expect(prompter.questions).toContain('Continue selling? (Y/N): ');
    expectLineContaining('Sale recorded: $10.00 | Remaining stock: 6');
    expect(output()).toContain('Items sold: 1 | Session total: $10.00');
  });

  it('should show the reason a sale was refused', async () => {
    mockCommands.sell.mockReturnValue({
      ok: false,
      error: {
        code: 'InsufficientQuantity',
        message: 'Only 10 units of Apple available, 40 requested',
      },
    });

    await runWith(['1', '1', '40', '2', 'N', '9']);

    expectLineContaining('Only 10 units of Apple available, 40 requested');
    expect(output()).toContain('No sales made.');
  });

  it('should add a new item with the chosen category', async () => {
    mockCommands.findByName.mockReturnValue({
      ok: false,
      error: { code: 'NotFound', message: "Item 'Milk' not found" },
    });
    mockCommands.add.mockReturnValue({
      ok: true,
      data: { ...apple, id: 4, name: 'Milk', category: 'Dairy', quantity: 6, lastPrice: 1.2 },
    });

    await runWith(['2', '4', 'Milk', '5', '1.2', '6', 'N', '9']);

    expect(mockCommands.add).toHaveBeenCalledWith({
      id: 4,
      name: 'Milk',
      category: 'Dairy',
      quantity: 6,
      price: 1.2,
    });
    expectLineContaining("Item 'Milk' added successfully!");
    expect(output()).toContain('Total items added/updated: 1');
  });

  it('should ask for the name again before any other field when it is blank', async () => {
    mockCommands.findByName.mockReturnValue({
      ok: false,
      error: { code: 'NotFound', message: "Item 'Milk' not found" },
    });
    mockCommands.add.mockReturnValue({
      ok: true,
      data: { ...apple, id: 4, name: 'Milk', category: 'Dairy', quantity: 6, lastPrice: 1.2 },
    });

    const prompter = await runWith(['2', '4', '   ', 'Milk', '5', '1.2', '6', 'N', '9']);

    expect(prompter.questions.slice(1, 4)).toEqual([
      'Enter product ID: ',
      'Enter item name: ',
      'Enter item name: ',
    ]);
    expectLineContaining('Item name cannot be empty');
    expect(mockCommands.findByName).toHaveBeenCalledTimes(1);
    expect(mockCommands.findByName).toHaveBeenCalledWith('Milk');
    expect(mockCommands.add).toHaveBeenCalledWith(
      expect.objectContaining({ id: 4, name: 'Milk', category: 'Dairy' }),
    );
  });

  it('should offer a restock when the name already exists', async () => {
    mockCommands.findByName.mockReturnValue({ ok: true, data: apple });
    mockCommands.restock.mockReturnValue({ ok: true, data: { ...apple, quantity: 15 } });

    const prompter = await runWith(['2', '3', 'Apple', 'y', '5', 'N', '9']);

    expect(prompter.questions).toContain('Add more quantity to existing item? (Y/N): ');
    expect(mockCommands.restock).toHaveBeenCalledWith({ itemId: 1, quantity: 5 });
    expect(mockCommands.add).not.toHaveBeenCalled();
    expectLineContaining('Stock updated! New quantity: 15');
  });

  it('should delete only after confirmation', async () => {
    mockCommands.findByName.mockReturnValue({ ok: true, data: apple });
    mockCommands.remove.mockReturnValue({ ok: true, data: apple });

    await runWith(['5', 'Apple', 'N', '5', 'Apple', 'Y', '9']);

    expect(mockCommands.remove).toHaveBeenCalledTimes(1);
    expect(mockCommands.remove).toHaveBeenCalledWith(1);
    expect(output()).toContain('Deletion cancelled.');
    expect(
      output().some((line) => line.includes('Quantity') && line.endsWith(' 10')),
    ).toBe(true);
    expectLineContaining("Item 'Apple' deleted successfully!");
  });

  it('should update a single field', async () => {
    mockCommands.findByName.mockReturnValue({ ok: true, data: apple });
    mockCommands.update.mockReturnValue({ ok: true, data: { ...apple, lastPrice: 2.4 } });

    await runWith(['4', 'Apple', '5', '2.40', '9']);

    expect(mockCommands.update).toHaveBeenCalledWith(1, { lastPrice: 2.4 });
    expectLineContaining('Item updated successfully!');
  });

  it('should show a warning attached to a successful change', async () => {
    mockCommands.findByName.mockReturnValue({ ok: true, data: apple });
    mockCommands.update.mockReturnValue({
      ok: true,
      data: { ...apple, quantity: 3 },
      warning: 'Change saved, but the activity log was not updated: disk full',
    });

    await runWith(['4', 'Apple', '4', '3', '9']);

    expect(mockCommands.update).toHaveBeenCalledWith(1, { quantity: 3 });
    expectLineContaining('Change saved, but the activity log was not updated: disk full');
  });

  it('should print the history summary and recent entries', async () => {
    mockCommands.history.mockReturnValue({
      ok: true,
      data: {
        summary: { total: 3, SALE: 1, ADD: 1, RESTOCK: 0, UPDATE: 0, DELETE: 0, SYSTEM: 1 },
        recent: [
          {
            timestamp: new Date(2026, 2, 1, 10, 5, 0),
            action: LogAction.SALE,
            detail: '4x Apple @ $2.50 each = $10.00 (remaining: 6)',
            amount: 10,
          },
        ],
      },
    });

    await runWith(['8', '9']);

    expect(output()).toContain(
      'SUMMARY: 3 total actions | 1 sales | 1 additions | 0 restocks | 0 updates | 0 deletions',
    );
    expect(output()).toContain(
      '[2026-03-01 10:05:00] SALE: 4x Apple @ $2.50 each = $10.00 (remaining: 6)',
    );
  });

  it('should change the low-stock threshold on request', async () => {
    mockCommands.lowStock.mockReturnValue({
      ok: true,
      data: { threshold: 15, outOfStock: [], lowStock: [] },
    });
    mockCommands.setThreshold.mockReturnValue({ ok: true, data: 5 });

    await runWith(['7', 'Y', '5', '9']);

    expect(mockCommands.setThreshold).toHaveBeenCalledWith(5);
    expectLineContaining('All items are well stocked! No alerts.');
  });
});

describe('number parsing', () => {
  it.each([
    ['42', 42],
    [' 7 ', 7],
    ['-3', -3],
    ['4.5', null],
    ['', null],
  ])('should read %j as the whole number %p', (text, expected) => {
    expect(parseWholeNumber(text)).toBe(expected);
  });

  it.each([
    ['2.50', 2.5],
    ['.5', 0.5],
    ['3', 3],
    ['2,50', null],
    ['abc', null],
  ])('should read %j as the amount %p', (text, expected) => {
    expect(parseDecimal(text)).toBe(expected);
  });
});
