import { Server } from 'socket.io';
import { SessionSocket, SocketGateway } from './socket.gateway';

describe('SocketGateway', () => {
  let gateway: SocketGateway;

  beforeEach(() => {
    gateway = new SocketGateway();
  });

  function fakeClient(auth: Record<string, unknown>, query: Record<string, unknown> = {}) {
    const client: SessionSocket = {
      id: 'socket-1',
      handshake: { auth, query },
      join: jest.fn(),
      emit: jest.fn().mockReturnValue(true),
    };
    return client;
  }

  it('joins the room of the session named in the handshake', async () => {
    const client = fakeClient({ sessionId: ' s1 ' });

    await gateway.handleConnection(client);

    expect(client.join).toHaveBeenCalledWith('s1');
    expect(client.emit).toHaveBeenCalledWith('connection:ack', { socketId: 'socket-1', sessionId: 's1' });
  });

  it('falls back to the query string', async () => {
    const client = fakeClient({}, { sessionId: 'from-query' });

    await gateway.handleConnection(client);

    expect(client.join).toHaveBeenCalledWith('from-query');
  });

  it('acknowledges a client without a session and joins nothing', async () => {
    const client = fakeClient({ sessionId: '' });

    await gateway.handleConnection(client);

    expect(client.join).not.toHaveBeenCalled();
    expect(client.emit).toHaveBeenCalledWith('connection:ack', { socketId: 'socket-1', sessionId: null });
  });

  it('broadcasts turn events to the session room', () => {
    const server = new Server();
    gateway.server = server;
    const to = jest.spyOn(server, 'to');
    const broadcast = jest.spyOn(server.sockets.adapter, 'broadcast');

    gateway.emitToSession('s1', { event: 'turn.state', data: { sessionId: 's1', state: 'AWAITING_MODEL' } });

    expect(to).toHaveBeenCalledWith('s1');
    expect(broadcast).toHaveBeenCalledWith(
      expect.objectContaining({ data: ['turn.state', { sessionId: 's1', state: 'AWAITING_MODEL' }] }),
      expect.objectContaining({ rooms: new Set(['s1']) }),
    );
  });

  it('does nothing before a server is bound', () => {
    expect(() =>
      gateway.emitToSession('s1', { event: 'turn.failed', data: { sessionId: 's1', error: 'x' } }),
    ).not.toThrow();
  });
});
