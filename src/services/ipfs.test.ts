import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { IPFSService, isMissingBlockError, isMissingPathError } from './ipfs';
import { NotFoundError, StorageUnavailableError } from '../utils/errors';

const NODE = 'http://kubo.test:5001/';
const CID = 'bafyreib2rxk3rybk3aobmv5cjuql3bm2twh4jo5uxgf5gwtdrh4fh2hsm4';

type FetchArgs = [input: string | URL | Request, init?: RequestInit];

function stubFetch(respond: (url: URL) => Response | Promise<Response>) {
  const fetchMock = vi.fn(async (...[input]: FetchArgs) => respond(new URL(String(input))));
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

function kuboError(message: string): Response {
  return new Response(JSON.stringify({ Message: message, Code: 0, Type: 'error' }), {
    status: 500,
    headers: { 'Content-Type': 'application/json' },
  });
}

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => undefined);
});

afterEach(() => {
  vi.unstubAllGlobals();
  vi.restoreAllMocks();
});

describe('IPFSService', () => {
  it('adds bytes with CIDv1 and pinning', async () => {
    const fetchMock = stubFetch(
      () => new Response('{"Name":"scan.txt","Hash":"bafkreiexample","Size":"11"}\n')
    );
    const ipfs = new IPFSService(NODE);

    const result = await ipfs.putBytes(new TextEncoder().encode('scan page 1'), 'scan.txt');

    expect(result).toEqual({ cid: 'bafkreiexample', size: 11 });
    const [input, init] = fetchMock.mock.calls[0];
    const url = new URL(String(input));
    expect(url.pathname).toBe('/api/v0/add');
    expect(url.searchParams.get('cid-version')).toBe('1');
    expect(url.searchParams.get('pin')).toBe('true');
    expect(init?.method).toBe('POST');
  });

  it('stores documents through dag/put and returns the link', async () => {
    const fetchMock = stubFetch(() => Response.json({ Cid: { '/': CID } }));
    const ipfs = new IPFSService(NODE);

    expect(await ipfs.putJSON({ pi: 'x', ver: 1 })).toBe(CID);
    const url = new URL(String(fetchMock.mock.calls[0][0]));
    expect(url.pathname).toBe('/api/v0/dag/put');
    expect(url.searchParams.get('store-codec')).toBe('dag-cbor');
    expect(url.searchParams.get('input-codec')).toBe('dag-json');
  });

  it('reads documents offline', async () => {
    const fetchMock = stubFetch(() => Response.json({ pi: 'x', ver: 1 }));
    const ipfs = new IPFSService(NODE);

    expect(await ipfs.getJSON(CID)).toEqual({ pi: 'x', ver: 1 });
    const url = new URL(String(fetchMock.mock.calls[0][0]));
    expect(url.pathname).toBe('/api/v0/dag/get');
    expect(url.searchParams.get('arg')).toBe(CID);
    expect(url.searchParams.get('offline')).toBe('true');
  });

  it('answers a block absent from the node with NotFoundError', async () => {
    stubFetch(() => kuboError(`block was not found locally (offline): ipld: could not find ${CID}`));
    const ipfs = new IPFSService(NODE);

    const read = ipfs.getJSON(CID);
    await expect(read).rejects.toBeInstanceOf(NotFoundError);
    await expect(read).rejects.toThrow(`Document not found: ${CID}`);
  });

  it('answers a blob absent from the node with NotFoundError', async () => {
    const fetchMock = stubFetch(() => kuboError('block was not found locally (offline): ipld: could not find node'));
    const ipfs = new IPFSService(NODE);

    await expect(ipfs.getBytes(CID)).rejects.toThrow(`Blob not found: ${CID}`);
    const url = new URL(String(fetchMock.mock.calls[0][0]));
    expect(url.pathname).toBe('/api/v0/cat');
    expect(url.searchParams.get('offline')).toBe('true');
  });

  it('keeps other node failures as storage errors', async () => {
    stubFetch(() => kuboError('datastore closed'));
    const ipfs = new IPFSService(NODE);

    const read = ipfs.getJSON(CID);
    await expect(read).rejects.toBeInstanceOf(StorageUnavailableError);
    await expect(read).rejects.toThrow('Storage unavailable: datastore closed');
  });

  it('reports an unreachable node as storage unavailable', async () => {
    stubFetch(() => Promise.reject(new TypeError('fetch failed')));
    const ipfs = new IPFSService(NODE);

    const read = ipfs.putJSON({ a: 1 });
    await expect(read).rejects.toBeInstanceOf(StorageUnavailableError);
    await expect(read).rejects.toThrow(
      'Storage unavailable: Failed to connect to IPFS node: fetch failed'
    );
  });

  it('recognizes a missing MFS path', async () => {
    stubFetch(() => kuboError('file does not exist'));
    const ipfs = new IPFSService(NODE);

    const error = await ipfs.mfsRead('/ledger/tips/01/AB/01AB.tip').catch((e: unknown) => e);
    expect(isMissingPathError(error)).toBe(true);
    expect(isMissingBlockError(error)).toBe(false);
  });

  it('writes MFS files with the requested flags', async () => {
    const fetchMock = stubFetch(() => new Response(''));
    const ipfs = new IPFSService(NODE);

    await ipfs.mfsWrite('/ledger/index/pointer', 'bafy', { create: true, truncate: true, parents: true });

    const url = new URL(String(fetchMock.mock.calls[0][0]));
    expect(url.pathname).toBe('/api/v0/files/write');
    expect(url.searchParams.get('arg')).toBe('/ledger/index/pointer');
    expect(url.searchParams.get('create')).toBe('true');
    expect(url.searchParams.get('truncate')).toBe('true');
    expect(url.searchParams.get('parents')).toBe('true');
  });
});
