import { describe, expect, it } from 'vitest';
import {
  CycleDetectedError,
  DuplicateIdError,
  isRowtreeError,
  RowtreeError,
  TreeContractError,
  TreeError,
  wrapError,
} from '../src/errors/index.js';

describe('Tree errors', () => {
  it('carries kind, module and operation', () => {
    const error = new CycleDetectedError('loop', 'assembleTree', [1, 2, 1], { depth: 3 });

    expect(error).toBeInstanceOf(TreeError);
    expect(error).toBeInstanceOf(RowtreeError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('CycleDetectedError');
    expect(error.kind).toBe('CycleDetected');
    expect(error.module).toBe('tree');
    expect(error.operation).toBe('assembleTree');
    expect(error.context).toEqual({ depth: 3, path: [1, 2, 1] });
  });

  it('describes duplicate ids', () => {
    const error = new DuplicateIdError('a', 2);

    expect(error.message).toBe('Duplicate id found: a (appears 2 times)');
    expect(error.kind).toBe('DuplicateId');
    expect(error.context).toEqual({ id: 'a', count: 2 });
  });

  it('includes kind when serialized', () => {
    const json = new TreeContractError('getId must be a function', 'getId', 'listToTree').toJSON();

    expect(json).toMatchObject({
      name: 'TreeContractError',
      kind: 'ContractViolation',
      message: 'getId must be a function',
      module: 'tree',
      operation: 'listToTree',
      context: { parameter: 'getId' },
    });
  });
});

describe('wrapError', () => {
  it('wraps foreign errors with module context', () => {
    const cause = new Error('boom');

    const wrapped = wrapError(cause, 'tree', 'walkTree', { nodes: 3 });

    expect(isRowtreeError(wrapped)).toBe(true);
    expect(wrapped.message).toBe('boom');
    expect(wrapped.module).toBe('tree');
    expect(wrapped.operation).toBe('walkTree');
    expect(wrapped.context).toEqual({ nodes: 3, cause });
  });

  it('returns rowtree errors unchanged', () => {
    const error = new DuplicateIdError(1, 2);

    expect(wrapError(error, 'tree', 'listToTree', { records: 2 })).toBe(error);
  });

  it('stringifies non-errors', () => {
    expect(wrapError('plain', 'tree', 'flattenTree').message).toBe('plain');
  });
});
