import { createConnector, GitBlameConnector, StackExchangeConnector } from '.';

describe('createConnector', () => {
  it('should build a StackExchange connector', () => {
    const connector = createConnector({
      kind: 'stackexchange',
      options: { site: 'stackoverflow', tagged: 'typescript', token: 'test-token' }
    });

    expect(connector).toBeInstanceOf(StackExchangeConnector);
    expect(connector.origin).toBe('stackoverflow');
    expect(connector.name).toBe('StackExchange');
  });

  it('should build a GitBlame connector', () => {
    const connector = createConnector({
      kind: 'gitblame',
      options: { uri: 'https://example.com/project.git', gitPath: '/tmp/harvester-never-opened' }
    });

    expect(connector).toBeInstanceOf(GitBlameConnector);
    expect(connector.origin).toBe('https://example.com/project.git');
    expect(connector.cache).toBeUndefined();
  });
});
