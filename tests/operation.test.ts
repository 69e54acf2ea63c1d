import { MetadataRegistry } from '../src/operation/MetadataRegistry';
import { Operation } from '../src/operation/Operation';
import type { OperationProtocol, OperationsApi } from '../src/operation/Operation';
import { MetadataRegistryError, OperationCompleteError } from '../src/utils/errors';

const TYPE_URL = MetadataRegistry.computeTypeUrl('test.ExportMetadata');

function createOperationsApi() {
  return {
    getOperation: jest.fn(
      async (request: { name: string }): Promise<OperationProtocol> => ({ name: request.name, done: false })
    )
  } satisfies OperationsApi;
}

describe('MetadataRegistry', () => {
  test('computes type URLs with the default and a custom prefix', () => {
    expect(TYPE_URL).toBe('types.googleapis.com/test.ExportMetadata');
    expect(MetadataRegistry.computeTypeUrl('test.ExportMetadata', 'example.com')).toBe('example.com/test.ExportMetadata');
  });

  test('registers and looks up decoders', () => {
    const registry = new MetadataRegistry();
    const decode = (value: Uint8Array) => value.length;

    registry.register(TYPE_URL, decode);

    expect(registry.has(TYPE_URL)).toBe(true);
    expect(registry.lookup(TYPE_URL)).toBe(decode);
    expect(registry.lookup('types.googleapis.com/test.Unknown')).toBeUndefined();
  });

  test('allows re-registering the same decoder but not a different one', () => {
    const registry = new MetadataRegistry();
    const decode = (value: Uint8Array) => value.length;

    registry.register(TYPE_URL, decode);
    expect(() => registry.register(TYPE_URL, decode)).not.toThrow();
    expect(() => registry.register(TYPE_URL, () => 0)).toThrow(MetadataRegistryError);
  });

  test('registries are independent', () => {
    const first = new MetadataRegistry();
    const second = new MetadataRegistry();

    first.register(TYPE_URL, () => 'first');

    expect(second.has(TYPE_URL)).toBe(false);
  });
});

describe('Operation', () => {
  test('fromProtocol decodes known metadata', () => {
    const registry = new MetadataRegistry();
    registry.register(TYPE_URL, (value) => ({ bytes: value.length }));
    const api = createOperationsApi();

    const operation = Operation.fromProtocol(
      { name: 'operations/export-1', metadata: { typeUrl: TYPE_URL, value: new Uint8Array([1, 2, 3]) } },
      api,
      registry
    );

    expect(operation.name).toBe('operations/export-1');
    expect(operation.client).toBe(api);
    expect(operation.metadata).toEqual({ bytes: 3 });
    expect(operation.complete).toBe(false);
    expect(operation.target).toBeNull();
  });

  test('fromProtocol leaves unknown or absent metadata undecoded', () => {
    const registry = new MetadataRegistry();
    const api = createOperationsApi();

    const unknown = Operation.fromProtocol(
      { name: 'operations/a', metadata: { typeUrl: TYPE_URL, value: new Uint8Array() } },
      api,
      registry
    );
    const absent = Operation.fromProtocol({ name: 'operations/b' }, api, registry);

    expect(unknown.metadata).toBeNull();
    expect(absent.metadata).toBeNull();
    expect(new Operation('operations/c', api).metadata).toBeNull();
  });

  test('finished polls until the server reports done', async () => {
    const api = createOperationsApi();
    api.getOperation
      .mockResolvedValueOnce({ name: 'operations/export-1', done: false })
      .mockResolvedValueOnce({ name: 'operations/export-1', done: true });
    const operation = new Operation('operations/export-1', api);

    await expect(operation.finished()).resolves.toBe(false);
    expect(operation.complete).toBe(false);

    await expect(operation.finished()).resolves.toBe(true);
    expect(operation.complete).toBe(true);

    expect(api.getOperation).toHaveBeenCalledTimes(2);
    expect(api.getOperation).toHaveBeenCalledWith({ name: 'operations/export-1' });
  });

  test('finished refuses to poll a completed operation', async () => {
    const api = createOperationsApi();
    api.getOperation.mockResolvedValueOnce({ name: 'operations/export-1', done: true });
    const operation = new Operation('operations/export-1', api);
    await operation.finished();

    await expect(operation.finished()).rejects.toThrow(OperationCompleteError);
    expect(api.getOperation).toHaveBeenCalledTimes(1);
  });
});
