import { describe, it, expect, vi } from 'vitest';
import {
  GitHubClient,
  findPackagesOnHost,
  packageNamesFromRepositories,
  type FetchLike,
  type HostClient,
} from '../src/host/github-client.js';
import { ConfigError, HostApiError } from '../src/utils/errors.js';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function pagedFetch(pages: unknown[][]) {
  const impl: FetchLike = async (url) => {
    const page = Number(new URL(url).searchParams.get('page'));
    return jsonResponse(pages[page - 1] ?? []);
  };
  return vi.fn(impl);
}

describe('packageNamesFromRepositories', () => {
  it('keeps non-fork repositories with the package suffix and strips it', () => {
    const names = packageNamesFromRepositories([
      { name: 'Foo.jl', fork: false },
      { name: 'Bar.jl', fork: true },
      { name: 'notes', fork: false },
      { name: '.jl', fork: false },
      { name: 'Foo.jl', fork: false },
    ]);
    expect([...names]).toEqual(['Foo']);
  });

  it('accepts a custom suffix', () => {
    expect([...packageNamesFromRepositories([{ name: 'tool-pkg', fork: false }], '-pkg')]).toEqual(['tool']);
  });
});

describe('GitHubClient', () => {
  it('pages until an empty page and authenticates every request', async () => {
    const fetchMock = pagedFetch([
      [{ name: 'Foo.jl', fork: false, private: true }],
      [{ name: 'Baz.jl', fork: false }],
    ]);
    const client = new GitHubClient({ token: 'test-token', apiUrl: 'https://api.example.test', fetch: fetchMock });

    const repos = await client.listRepositories();

    expect(repos).toEqual([
      { name: 'Foo.jl', fork: false },
      { name: 'Baz.jl', fork: false },
    ]);
    expect(fetchMock).toHaveBeenCalledTimes(3);
    expect(fetchMock.mock.calls[0][0]).toBe('https://api.example.test/user/repos?per_page=100&page=1');
    expect(fetchMock.mock.calls[2][0]).toBe('https://api.example.test/user/repos?per_page=100&page=3');
    expect(fetchMock.mock.calls[0][1].headers.Authorization).toBe('Bearer test-token');
  });

  it('raises HostApiError on a non-2xx response', async () => {
    const impl: FetchLike = async () => jsonResponse({ message: 'Bad credentials' }, 401);
    const fetchMock = vi.fn(impl);
    const client = new GitHubClient({ token: 'test-token', fetch: fetchMock });

    await expect(client.listRepositories()).rejects.toBeInstanceOf(HostApiError);
    await expect(client.listRepositories()).rejects.toThrow(
      'Source host request failed with HTTP 401: https://api.github.com/user/repos?per_page=100&page=1 ({"message":"Bad credentials"})',
    );
  });

  it('raises HostApiError on an unexpected payload', async () => {
    const impl: FetchLike = async () => jsonResponse({ oops: true });
    const fetchMock = vi.fn(impl);
    const client = new GitHubClient({ token: 'test-token', fetch: fetchMock });

    await expect(client.listRepositories()).rejects.toThrow(/unexpected payload/);
  });
});

describe('findPackagesOnHost', () => {
  it('fails before any request when the token is missing', async () => {
    const fetchMock = pagedFetch([]);

    await expect(findPackagesOnHost({ env: {}, fetch: fetchMock })).rejects.toBeInstanceOf(ConfigError);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('reads the token from GITHUB_AUTH', async () => {
    const fetchMock = pagedFetch([[{ name: 'Foo.jl', fork: false }, { name: 'Bar.jl', fork: true }]]);

    const names = await findPackagesOnHost({ env: { GITHUB_AUTH: 'test-token' }, fetch: fetchMock });

    expect([...names]).toEqual(['Foo']);
    expect(fetchMock.mock.calls[0][1].headers.Authorization).toBe('Bearer test-token');
  });

  it('uses an injected client as is', async () => {
    const client: HostClient = {
      listRepositories: async () => [
        { name: 'Alpha.jl', fork: false },
        { name: 'Beta.jl', fork: false },
      ],
    };

    expect(await findPackagesOnHost({ client, env: {} })).toEqual(new Set(['Alpha', 'Beta']));
  });
});
