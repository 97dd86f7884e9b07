import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { EventEmitter } from 'node:events';
import { UnityConnection } from './UnityConnection.js';
import { UnityCommandError } from './types.js';

class FakeSocket extends EventEmitter {
    sent: string[] = [];
    closed = false;

    send(data: string): void {
        this.sent.push(data);
    }

    close(): void {
        this.closed = true;
        this.emit('close');
    }

    reply(message: unknown): void {
        this.emit('message', Buffer.from(JSON.stringify(message)));
    }

    lastSent(): { type: string; data: { id: string; command: string; params: unknown } } {
        return JSON.parse(this.sent[this.sent.length - 1]);
    }
}

describe('UnityConnection', () => {
    let connection: UnityConnection;
    let socket: FakeSocket;

    beforeEach(() => {
        vi.spyOn(console, 'error').mockImplementation(() => {});
        connection = new UnityConnection({ listen: false, commandTimeoutMs: 1000, features: ['import_asset'] });
        socket = new FakeSocket();
    });

    afterEach(() => {
        connection.close();
        vi.useRealTimers();
        vi.restoreAllMocks();
    });

    it('should reject commands while Unity is not connected', async () => {
        await expect(connection.sendCommand('GET_ASSET_LIST', {})).rejects.toMatchObject({
            name: 'UnityCommandError',
            reason: 'not_connected',
            command: 'GET_ASSET_LIST',
        });
        expect(connection.isConnected()).toBe(false);
    });

    it('should resolve a command with the result carrying its id', async () => {
        connection.attach(socket);

        const pending = connection.sendCommand('GET_ASSET_LIST', { folder: 'Assets' });
        const sent = socket.lastSent();
        expect(sent.type).toBe('command');
        expect(sent.data.command).toBe('GET_ASSET_LIST');
        expect(sent.data.params).toEqual({ folder: 'Assets' });

        socket.reply({ type: 'commandResult', data: { id: 'unknown-id', result: { assets: ['wrong'] } } });
        socket.reply({ type: 'commandResult', data: { id: sent.data.id, result: { assets: [] } } });

        await expect(pending).resolves.toEqual({ assets: [] });
    });

    it('should match concurrent results to their commands by id', async () => {
        connection.attach(socket);

        const first = connection.sendCommand('FIND_OBJECTS_BY_NAME', { name: 'Cube' });
        const firstId = socket.lastSent().data.id;
        const second = connection.sendCommand('FIND_OBJECTS_BY_NAME', { name: 'Sphere' });
        const secondId = socket.lastSent().data.id;

        socket.reply({ type: 'commandResult', data: { id: secondId, result: { objects: ['Sphere'] } } });
        socket.reply({ type: 'commandResult', data: { id: firstId, result: { objects: ['Cube'] } } });

        await expect(first).resolves.toEqual({ objects: ['Cube'] });
        await expect(second).resolves.toEqual({ objects: ['Sphere'] });
    });

    it('should time out a command that gets no answer', async () => {
        vi.useFakeTimers();
        connection.attach(socket);

        const assertion = expect(connection.sendCommand('IMPORT_ASSET', {})).rejects.toMatchObject({
            reason: 'timeout',
            message: 'IMPORT_ASSET timed out after 1 seconds. This may indicate an issue with the Unity Editor.',
        });
        vi.advanceTimersByTime(1001);

        await assertion;
    });

    it('should reject pending commands when the socket closes', async () => {
        connection.attach(socket);

        const pending = connection.sendCommand('APPLY_PREFAB', { object_name: 'Door' });
        socket.close();

        await expect(pending).rejects.toBeInstanceOf(UnityCommandError);
        await expect(pending).rejects.toMatchObject({ reason: 'disconnected' });
        expect(connection.isConnected()).toBe(false);
    });

    it('should answer the handshake with the server features', () => {
        connection.attach(socket);

        socket.reply({ type: 'hello', data: { unityVersion: '2022.3.10f1', platform: 'WindowsEditor' } });

        const welcome = JSON.parse(socket.sent[0]);
        expect(welcome.type).toBe('welcome');
        expect(welcome.data.features).toEqual(['import_asset']);
        expect(welcome.data.serverVersion).toBe('0.3.0');
    });

    it('should close the previous socket when Unity reconnects', () => {
        const replacement = new FakeSocket();
        connection.attach(socket);
        connection.attach(replacement);

        expect(socket.closed).toBe(true);
        expect(connection.isConnected()).toBe(true);
    });

    it('should resolve waitForConnection once a socket is attached', async () => {
        const waiting = connection.waitForConnection(5000);
        connection.attach(socket);

        await expect(waiting).resolves.toBe(true);
    });
});
