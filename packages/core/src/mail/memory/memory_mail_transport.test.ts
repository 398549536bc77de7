import { MemoryMailTransport } from './memory_mail_transport';

describe('MemoryMailTransport', () => {
  it('should record sent mail', async () => {
    const transport = new MemoryMailTransport();

    await transport.send({ to: 'a@example.test', subject: 'Hello', html: '<p>x</p>' });

    expect(transport.getSent()).toEqual([{ to: 'a@example.test', subject: 'Hello', html: '<p>x</p>' }]);
  });

  it('should fail on demand and recover', async () => {
    const transport = new MemoryMailTransport();
    transport.failWith(new Error('relay down'));

    await expect(transport.send({ to: 'a@example.test', subject: 'Hello', html: '' })).rejects.toThrow('relay down');

    transport.failWith(null);
    await transport.send({ to: 'a@example.test', subject: 'Hello', html: '' });
    expect(transport.getSent()).toHaveLength(1);
  });

  it('should refuse to send after close', async () => {
    const transport = new MemoryMailTransport();
    await transport.close();

    await expect(transport.send({ to: 'a@example.test', subject: 'Hello', html: '' })).rejects.toThrow(
      'Mail transport is closed'
    );
  });
});
