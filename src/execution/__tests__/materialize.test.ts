import { describe, it, expect, beforeEach } from 'vitest';
import {
    bindParameters,
    buildCommand,
    normalizeParameterName,
    obtainConnection,
    prepareCommand,
} from '../materialize.js';
import { SqlProps } from '../../config/SqlProps.js';
import { ConfigurationError } from '../../types/index.js';
import { SqlValues } from '../../values/SqlValue.js';
import { FakeDatabase } from '../../__tests__/mocks/driver.js';

describe('normalizeParameterName', () => {
    it('should prefix a missing sigil', () => {
        expect(normalizeParameterName('id')).toBe('@id');
    });

    it('should keep an existing sigil', () => {
        expect(normalizeParameterName('@id')).toBe('@id');
    });

    it('should trim whitespace first', () => {
        expect(normalizeParameterName('  id ')).toBe('@id');
        expect(normalizeParameterName(' @id')).toBe('@id');
    });
});

describe('obtainConnection', () => {
    let database: FakeDatabase;

    beforeEach(() => {
        database = new FakeDatabase();
    });

    it('should create and own a connection for a connection string', () => {
        const certificate = { cert: 'test-cert', key: 'test-key' };
        const props = SqlProps.create({
            target: { kind: 'connectionString', connectionString: 'Host=db;Database=inventory' },
            driver: database.driver(),
            clientCertificate: certificate,
        });

        const acquired = obtainConnection(props);

        expect(acquired.owned).toBe(true);
        expect(acquired.connection).toBe(database.connections[0]);
        expect(database.connectionStrings).toEqual(['Host=db;Database=inventory']);
        expect(database.certificates).toEqual([certificate]);
    });

    it('should borrow an existing connection', () => {
        const connection = database.connection(true);
        const props = SqlProps.create({ target: { kind: 'connection', connection } });

        expect(obtainConnection(props)).toEqual({ connection, owned: false });
    });

    it("should borrow a transaction's connection", () => {
        const connection = database.connection(true);
        const transaction = connection.beginTransaction();
        const props = SqlProps.create({ target: { kind: 'transaction', transaction } });

        expect(obtainConnection(props)).toEqual({ connection, owned: false });
    });

    it('should throw for an empty target', () => {
        expect(() => obtainConnection(SqlProps.create())).toThrow(
            new ConfigurationError('Could not create a connection from empty parameters.'),
        );
    });
});

describe('buildCommand', () => {
    it('should use the first query text', () => {
        const database = new FakeDatabase();
        const connection = database.connection(true);
        const props = SqlProps.create({ target: { kind: 'connection', connection } }).query('SELECT 1');

        expect(buildCommand(props, connection).text).toBe('SELECT 1');
    });

    it('should attach the target transaction', () => {
        const database = new FakeDatabase();
        const connection = database.connection(true);
        const transaction = connection.beginTransaction();
        const props = SqlProps.create({ target: { kind: 'transaction', transaction } }).query(
            'DELETE FROM carts',
        );

        const command = buildCommand(props, connection);
        command.executeNonQuery();

        expect(transaction.pending.map((statement) => statement.text)).toEqual(['DELETE FROM carts']);
        expect(database.committed).toEqual([]);
    });
});

describe('bindParameters', () => {
    it('should bind in order with normalized names and wire types', () => {
        const command = new FakeDatabase().connection(true).createCommand('INSERT ...');

        bindParameters(command, [
            ['name', SqlValues.text('widget')],
            ['@qty', SqlValues.int16(3)],
            [' price', SqlValues.decimal('9.99')],
            ['note', SqlValues.dbnull],
        ]);

        expect(command.parameters).toEqual([
            { name: '@name', wireType: 'text', value: 'widget' },
            { name: '@qty', wireType: 'smallint', value: 3 },
            { name: '@price', wireType: 'numeric', value: '9.99' },
            { name: '@note', wireType: null, value: null },
        ]);
    });

    it('should pass raw parameters through with only the name normalized', () => {
        const command = new FakeDatabase().connection(true).createCommand('SELECT ...');

        bindParameters(command, [
            ['tags', SqlValues.parameter({ name: 'ignored', value: ['a', 'b'], wireType: 'text[]' })],
            ['raw', SqlValues.parameter({ name: 'raw', value: 5 })],
        ]);

        expect(command.parameters).toEqual([
            { name: '@tags', wireType: 'text[]', value: ['a', 'b'] },
            { name: '@raw', wireType: null, value: 5 },
        ]);
    });
});

describe('prepareCommand', () => {
    it('should switch to stored-procedure mode and prepare when requested', () => {
        const database = new FakeDatabase();
        const connection = database.connection(true);
        const props = SqlProps.create({ target: { kind: 'connection', connection } })
            .func('refresh_totals')
            .parameters([['since', SqlValues.date(new Date('2024-01-01T00:00:00Z'))]])
            .prepare();
        const command = buildCommand(props, connection);

        prepareCommand(props, command);
        command.executeNonQuery();

        expect(database.executed).toEqual([
            {
                text: 'refresh_totals',
                commandType: 'storedProcedure',
                parameters: [{ name: '@since', wireType: 'date', value: new Date('2024-01-01T00:00:00Z') }],
                prepared: true,
                inTransaction: false,
            },
        ]);
    });
});
