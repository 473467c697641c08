/**
 * pg-fluent - Execution Engine Tests
 *
 * Runs every verb against the in-memory driver in both blocking and
 * yielding mode.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { SqlProps } from '../../config/SqlProps.js';
import { ConfigurationError, MissingQueryError, NoResultsError } from '../../types/index.js';
import { SqlValues } from '../../values/SqlValue.js';
import type { RowReader } from '../../driver/RowReader.js';
import { FakeDatabase } from '../../__tests__/mocks/driver.js';

const readName = (row: RowReader): string => row.text('name');

const PRODUCTS = [
    { id: 1, name: 'bolt' },
    { id: 2, name: 'nut' },
    { id: 3, name: 'washer' },
];

describe('Execution engine', () => {
    let database: FakeDatabase;
    let consoleErrorSpy: ReturnType<typeof vi.spyOn>;

    const connect = (): SqlProps =>
        SqlProps.create({
            target: { kind: 'connectionString', connectionString: 'Host=db;Database=inventory' },
            driver: database.driver(),
        });

    beforeEach(() => {
        database = new FakeDatabase();
        consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => { });
    });

    afterEach(() => {
        consoleErrorSpy.mockRestore();
    });

    // =========================================================================
    // execute
    // =========================================================================

    describe('execute', () => {
        it('should decode every row in server order', async () => {
            database.on('SELECT * FROM products', { rows: PRODUCTS });

            const result = await connect().query('SELECT * FROM products').execute(readName);

            expect(result).toEqual({ success: true, data: ['bolt', 'nut', 'washer'] });
        });

        it('should open and close an owned connection around the query', async () => {
            await connect().query('SELECT * FROM products').execute(readName);

            expect(database.events).toEqual(['open', 'execute: SELECT * FROM products', 'close']);
            expect(database.disposedCommands).toBe(1);
            expect(database.closedReaders).toBe(1);
        });

        it('should return an empty list for an empty result set', async () => {
            const result = await connect().query('SELECT * FROM products WHERE false').execute(readName);

            expect(result).toEqual({ success: true, data: [] });
        });

        it('should bind parameters and prepare when requested', async () => {
            await connect()
                .query('SELECT * FROM products WHERE id = @id')
                .parameters([['id', SqlValues.int(2)]])
                .prepare()
                .execute(readName);

            expect(database.executed[0]?.parameters).toEqual([{ name: '@id', wireType: 'integer', value: 2 }]);
            expect(database.executed[0]?.prepared).toBe(true);
        });

        it('should fail without touching a connection when no query is set', async () => {
            const result = await connect().execute(readName);

            expect(result.success).toBe(false);
            expect(result.error).toBeInstanceOf(MissingQueryError);
            expect(database.connections).toEqual([]);
        });

        it('should close an owned connection when the driver fails', async () => {
            const fault = new Error('relation "products" does not exist');
            database.on('SELECT * FROM products', { error: fault });

            const result = await connect().query('SELECT * FROM products').execute(readName);

            expect(result).toEqual({ success: false, error: fault });
            expect(result.error).toBe(fault);
            expect(database.events).toEqual(['open', 'execute: SELECT * FROM products', 'close']);
        });

        it('should close an owned connection when opening fails', async () => {
            database.openError = new Error('connection refused');

            const result = await connect().query('SELECT 1').execute(readName);

            expect(result.error?.message).toBe('connection refused');
            expect(database.events).toEqual(['close']);
        });

        it('should turn a decoder error into a failure', async () => {
            database.on('SELECT * FROM products', { rows: PRODUCTS });

            const result = await connect()
                .query('SELECT * FROM products')
                .execute((row) => row.int('missing'));

            expect(result.error?.message).toBe("Column 'missing' was not found in the result set");
            expect(database.closedReaders).toBe(1);
            expect(database.events.at(-1)).toBe('close');
        });

        it('should log failures with the execution code', async () => {
            database.on('SELECT 1', { error: new Error('boom') });

            await connect().query('SELECT 1').execute(readName);

            expect(String(consoleErrorSpy.mock.calls[0]?.[0])).toMatch(
                /\[ERROR\] \[EXECUTION\] \[SQL_EXECUTION_FAILED\] execute failed: boom \{"operation":"execute","errorName":"Error"\}$/,
            );
        });

        it('should throw rather than fail for an empty target', async () => {
            await expect(SqlProps.create().query('SELECT 1').execute(readName)).rejects.toThrow(
                ConfigurationError,
            );
        });
    });

    // =========================================================================
    // Borrowed connections and transactions
    // =========================================================================

    describe('existing connections', () => {
        it('should never open or close an open borrowed connection', async () => {
            const connection = database.connection(true);
            database.on('SELECT * FROM products', { rows: PRODUCTS });

            const result = await SqlProps.create({ target: { kind: 'connection', connection } })
                .query('SELECT * FROM products')
                .execute(readName);

            expect(result.success).toBe(true);
            expect(database.events).toEqual(['execute: SELECT * FROM products']);
            expect(connection.isOpen).toBe(true);
        });

        it('should open a closed borrowed connection and leave it open', async () => {
            const connection = database.connection(false);

            await SqlProps.create({ target: { kind: 'connection', connection } }).query('SELECT 1').execute(readName);

            expect(database.events).toEqual(['open', 'execute: SELECT 1']);
            expect(connection.isOpen).toBe(true);
        });

        it('should leave a borrowed connection open on failure', async () => {
            const connection = database.connection(true);
            database.on('SELECT 1', { error: new Error('boom') });

            const result = await SqlProps.create({ target: { kind: 'connection', connection } })
                .query('SELECT 1')
                .execute(readName);

            expect(result.success).toBe(false);
            expect(connection.isOpen).toBe(true);
            expect(database.events).not.toContain('close');
        });

        it('should run inside a borrowed transaction without committing it', async () => {
            const connection = database.connection(true);
            const transaction = connection.beginTransaction();

            const result = await SqlProps.create({ target: { kind: 'transaction', transaction } })
                .query('DELETE FROM carts')
                .executeNonQuery();

            expect(result.success).toBe(true);
            expect(transaction.pending.map((statement) => statement.text)).toEqual(['DELETE FROM carts']);
            expect(database.committed).toEqual([]);
            expect(database.events).toEqual(['begin', 'execute: DELETE FROM carts']);
        });
    });

    // =========================================================================
    // executeRow
    // =========================================================================

    describe('executeRow', () => {
        it('should decode the first row only', async () => {
            database.on('SELECT * FROM products', { rows: PRODUCTS });

            const result = await connect().query('SELECT * FROM products').executeRow(readName);

            expect(result).toEqual({ success: true, data: 'bolt' });
        });

        it('should decode a single row', async () => {
            database.on('SELECT count(*) AS total FROM products', { rows: [{ total: 3 }] });

            const result = await connect()
                .query('SELECT count(*) AS total FROM products')
                .executeRow((row) => row.int('total'));

            expect(result).toEqual({ success: true, data: 3 });
        });

        it('should fail with NoResultsError on an empty result set', async () => {
            const result = await connect().query('SELECT * FROM products WHERE false').executeRow(readName);

            expect(result.error).toBeInstanceOf(NoResultsError);
            expect(database.events.at(-1)).toBe('close');
        });
    });

    // =========================================================================
    // iter
    // =========================================================================

    describe('iter', () => {
        it('should call the action for each row in order', async () => {
            database.on('SELECT * FROM products', { rows: PRODUCTS });
            const seen: number[] = [];

            const result = await connect()
                .query('SELECT * FROM products')
                .iter((row) => {
                    seen.push(row.int('id'));
                });

            expect(result).toEqual({ success: true, data: undefined });
            expect(seen).toEqual([1, 2, 3]);
        });

        it('should keep the effects of rows handled before a failure', async () => {
            database.on('SELECT * FROM products', { rows: PRODUCTS });
            const seen: string[] = [];

            const result = await connect()
                .query('SELECT * FROM products')
                .iter((row) => {
                    const name = row.text('name');
                    if (name === 'washer') throw new Error('out of stock');
                    seen.push(name);
                });

            expect(result.error?.message).toBe('out of stock');
            expect(seen).toEqual(['bolt', 'nut']);
        });
    });

    // =========================================================================
    // executeNonQuery
    // =========================================================================

    describe('executeNonQuery', () => {
        it('should return the affected row count', async () => {
            database.on('UPDATE products SET price = price * 1.1', { affected: 3 });

            const result = await connect().query('UPDATE products SET price = price * 1.1').executeNonQuery();

            expect(result).toEqual({ success: true, data: 3 });
        });

        it('should call functions in stored-procedure mode', async () => {
            await connect()
                .func('refresh_totals')
                .parameters([['region', SqlValues.text('north')]])
                .executeNonQuery();

            expect(database.executed).toEqual([
                {
                    text: 'refresh_totals',
                    commandType: 'storedProcedure',
                    parameters: [{ name: '@region', wireType: 'text', value: 'north' }],
                    prepared: false,
                    inTransaction: false,
                },
            ]);
        });
    });

    // =========================================================================
    // Blocking twins
    // =========================================================================

    describe('blocking twins', () => {
        it('executeSync should match execute', () => {
            database.on('SELECT * FROM products', { rows: PRODUCTS });

            const result = connect().query('SELECT * FROM products').executeSync(readName);

            expect(result).toEqual({ success: true, data: ['bolt', 'nut', 'washer'] });
            expect(database.events).toEqual(['open', 'execute: SELECT * FROM products', 'close']);
        });

        it('executeRowSync should fail on an empty result set', () => {
            const result = connect().query('SELECT 1 WHERE false').executeRowSync(readName);

            expect(result.error).toBeInstanceOf(NoResultsError);
        });

        it('iterSync should visit every row', () => {
            database.on('SELECT * FROM products', { rows: PRODUCTS });
            const seen: string[] = [];

            connect()
                .query('SELECT * FROM products')
                .iterSync((row) => {
                    seen.push(row.text('name'));
                });

            expect(seen).toEqual(['bolt', 'nut', 'washer']);
        });

        it('executeNonQuerySync should close the connection on failure', () => {
            database.on('DELETE FROM products', { error: new Error('permission denied') });

            const result = connect().query('DELETE FROM products').executeNonQuerySync();

            expect(result.error?.message).toBe('permission denied');
            expect(database.events).toEqual(['open', 'execute: DELETE FROM products', 'close']);
        });

        it('should fail without a query and throw without a target', () => {
            expect(connect().executeNonQuerySync().error).toBeInstanceOf(MissingQueryError);
            expect(() => SqlProps.create().query('SELECT 1').executeNonQuerySync()).toThrow(ConfigurationError);
        });
    });

    // =========================================================================
    // Cancellation
    // =========================================================================

    describe('cancellation', () => {
        it('should fail before opening when the configured signal is already aborted', async () => {
            const controller = new AbortController();
            controller.abort(new Error('user cancelled'));

            const result = await connect()
                .query('SELECT 1')
                .cancellationToken(controller.signal)
                .execute(readName);

            expect(result.error?.message).toBe('user cancelled');
            expect(database.events).toEqual(['close']);
        });

        it('should abandon an in-flight round trip when the caller signal aborts', async () => {
            const connection = database.connection(true);
            database.on('SELECT pg_sleep(10)', { hang: true });
            const controller = new AbortController();

            const pending = SqlProps.create({ target: { kind: 'connection', connection } })
                .query('SELECT pg_sleep(10)')
                .executeNonQuery(controller.signal);
            controller.abort(new Error('timed out'));
            const result = await pending;

            expect(result.error?.message).toBe('timed out');
            expect(database.disposedCommands).toBe(1);
        });

        it('should still close an owned connection after an abort mid-flight', async () => {
            database.on('SELECT pg_sleep(10)', { hang: true });
            const controller = new AbortController();
            const props = connect().query('SELECT pg_sleep(10)').cancellationToken(controller.signal);

            const pending = props.executeNonQuery();
            // let the open round trip finish so the query is in flight
            await new Promise((resolve) => setTimeout(resolve, 0));
            controller.abort(new Error('timed out'));
            const result = await pending;

            expect(result.error?.message).toBe('timed out');
            expect(database.events).toEqual(['open', 'execute: SELECT pg_sleep(10)', 'close']);
        });
    });
});
