/**
 * Entity Extractor Tests
 */

import { describe, it } from 'node:test'
import assert from 'node:assert'
import { DEFAULT_VOCABULARY } from '@vydoc/core'
import {
  extractConstants,
  extractContractDocstring,
  extractEnums,
  extractEvents,
  extractFunctions,
  extractStructs,
  extractVariables,
} from '../src/extractors/index.js'
import { createSourceFile } from '../src/source.js'
import type { ExtractionContext } from '../src/types.js'

const context: ExtractionContext = { vocabulary: DEFAULT_VOCABULARY }

describe('Entity Extractors', () => {
  describe('Contract docstring', () => {
    it('should read the leading docstring', () => {
      const source = createSourceFile('\n    """\n    This is a contract docstring.\n    """\n    @external\n    def foo() -> bool:\n        pass\n    ')
      assert.strictEqual(extractContractDocstring(source), 'This is a contract docstring.')
    })

    it('should skip comments before the docstring', () => {
      const source = createSourceFile('# pragma version ^0.3.10\n"""\n@title Vault\n"""\n')
      assert.strictEqual(extractContractDocstring(source), '@title Vault')
    })

    it('should return null when code comes first', () => {
      assert.strictEqual(extractContractDocstring(createSourceFile('x: uint256\n"""not a docstring"""')), null)
      assert.strictEqual(extractContractDocstring(createSourceFile('')), null)
    })
  })

  describe('Enums', () => {
    it('should read an indented enum body', () => {
      const source = createSourceFile('\n    enum Status:\n        PENDING\n        COMPLETED\n    ')
      assert.deepStrictEqual(extractEnums(source), [{ name: 'Status', values: ['PENDING', 'COMPLETED'], diagnostics: [] }])
    })

    it('should read flags and brace bodies', () => {
      const source = createSourceFile('flag Roles:\n    ADMIN\n    MINTER\n\nenum Color { RED, GREEN }\n')
      assert.deepStrictEqual(
        extractEnums(source).map((e) => [e.name, e.values]),
        [
          ['Roles', ['ADMIN', 'MINTER']],
          ['Color', ['RED', 'GREEN']],
        ]
      )
    })

    it('should keep the first of duplicate values and warn', () => {
      const [color] = extractEnums(createSourceFile('enum Color { RED, GREEN, RED }'))

      assert.deepStrictEqual(color.values, ['RED', 'GREEN'])
      assert.deepStrictEqual(color.diagnostics, [
        {
          severity: 'warning',
          code: 'duplicate-enum-value',
          subject: 'Color.RED',
          message: "'RED' is declared more than once",
        },
      ])
    })
  })

  describe('Constants', () => {
    it('should read type and literal value', () => {
      const source = createSourceFile('\n    MAX_SUPPLY: constant(uint256) = 1000000\n    ')
      assert.deepStrictEqual(extractConstants(source, context), [
        { name: 'MAX_SUPPLY', type: { kind: 'scalar', name: 'uint256' }, value: '1000000', diagnostics: [] },
      ])
    })

    it('should stop the value at a comment and warn about unknown types', () => {
      const source = createSourceFile('NAME: constant(String[8]) = "a#b"  # c\nRATE: constant(decimal) = 1.5')
      const [name, rate] = extractConstants(source, context)

      assert.strictEqual(name.value, '"a#b"')
      assert.deepStrictEqual(name.diagnostics, [])
      assert.strictEqual(rate.value, '1.5')
      assert.deepStrictEqual(rate.diagnostics, [
        {
          severity: 'warning',
          code: 'non-conforming-type',
          subject: 'RATE',
          message: "'decimal' is not a valid Vyper type",
        },
      ])
    })

    it('should read a public constant', () => {
      const source = createSourceFile('MAX: public(constant(uint256)) = 5  # cap\nPAIR: public(constant(String[3])) = ",)"')
      assert.deepStrictEqual(extractConstants(source, context), [
        { name: 'MAX', type: { kind: 'scalar', name: 'uint256' }, value: '5', diagnostics: [] },
        { name: 'PAIR', type: { kind: 'scalar', name: 'String[3]' }, value: '",)"', diagnostics: [] },
      ])
    })

    it('should report a public wrapper that is not closed', () => {
      const [constant] = extractConstants(createSourceFile('MAX: public(constant(uint256) = 5'), context)

      assert.strictEqual(constant.value, '')
      assert.deepStrictEqual(constant.diagnostics, [
        {
          severity: 'error',
          code: 'malformed-declaration',
          subject: 'MAX',
          message: "Missing ')' closing public(...) of MAX",
        },
      ])
    })

    it('should report a constant without a value', () => {
      const [constant] = extractConstants(createSourceFile('X: constant(uint8)'), context)

      assert.strictEqual(constant.value, '')
      assert.deepStrictEqual(constant.diagnostics, [
        { severity: 'error', code: 'malformed-declaration', subject: 'X', message: 'Constant X has no value' },
      ])
    })
  })

  describe('Structs', () => {
    it('should read a brace-delimited struct', () => {
      const source = createSourceFile('\n    struct MyStruct {\n        field1: uint256\n        field2: address\n    }\n    ')
      assert.deepStrictEqual(extractStructs(source, context), [
        {
          name: 'MyStruct',
          fields: [
            { name: 'field1', type: { kind: 'scalar', name: 'uint256' } },
            { name: 'field2', type: { kind: 'scalar', name: 'address' } },
          ],
          diagnostics: [],
        },
      ])
    })

    it('should resolve array fields in an indented struct', () => {
      const [batch] = extractStructs(
        createSourceFile('struct Batch:\n    ids: DynArray[uint256, MAX_IDS]\n    owner: address\n'),
        context
      )

      assert.deepStrictEqual(batch.fields[0].type, {
        kind: 'dynarray',
        element: { kind: 'scalar', name: 'uint256' },
        bound: { kind: 'constant', name: 'MAX_IDS' },
      })
    })

    it('should drop a malformed field and keep its siblings', () => {
      const [broken] = extractStructs(
        createSourceFile('struct Broken:\n    good: uint8\n    bad: DynArray[uint8, 4\n    also_good: bool\n'),
        context
      )

      assert.deepStrictEqual(
        broken.fields.map((f) => f.name),
        ['good', 'also_good']
      )
      assert.deepStrictEqual(broken.diagnostics, [
        {
          severity: 'error',
          code: 'malformed-type',
          subject: 'Broken.bad',
          message: "Unbalanced brackets in type 'DynArray[uint8, 4'",
        },
      ])
    })

    it('should report an entry without a type', () => {
      const [odd] = extractStructs(createSourceFile('struct Odd { value }'), context)

      assert.deepStrictEqual(odd.fields, [])
      assert.deepStrictEqual(odd.diagnostics, [
        {
          severity: 'error',
          code: 'malformed-declaration',
          subject: 'Odd.value',
          message: "Expected 'name: type' but found 'value'",
        },
      ])
    })

    it('should report a struct whose brace is never closed', () => {
      const [open] = extractStructs(createSourceFile('struct Open {\n    a: uint8\n'), context)

      assert.deepStrictEqual(open.diagnostics, [
        { severity: 'error', code: 'malformed-declaration', subject: 'Open', message: "Missing '}' closing Open" },
      ])
    })
  })

  describe('Events', () => {
    it('should read plain event fields', () => {
      const source = createSourceFile('\n    event Transfer:\n        from: address\n        to: address\n        value: uint256\n    ')
      const [transfer] = extractEvents(source, context)

      assert.deepStrictEqual(transfer.fields, [
        { name: 'from', type: { kind: 'scalar', name: 'address' }, indexed: false },
        { name: 'to', type: { kind: 'scalar', name: 'address' }, indexed: false },
        { name: 'value', type: { kind: 'scalar', name: 'uint256' }, indexed: false },
      ])
    })

    it('should unwrap indexed fields', () => {
      const source = createSourceFile('event Approval:\n    owner: indexed(address)\n    spender: indexed(address)\n    value: uint256\n')
      const [approval] = extractEvents(source, context)

      assert.deepStrictEqual(
        approval.fields.map((f) => [f.name, f.type.name, f.indexed]),
        [
          ['owner', 'address', true],
          ['spender', 'address', true],
          ['value', 'uint256', false],
        ]
      )
    })

    it('should read the legacy parenthesised form', () => {
      const source = createSourceFile('event Transfer({_from: indexed(address), _to: indexed(address), _value: uint256})')
      const [transfer] = extractEvents(source, context)

      assert.deepStrictEqual(
        transfer.fields.map((f) => f.name),
        ['_from', '_to', '_value']
      )
      assert.strictEqual(transfer.fields[2].indexed, false)
    })

    it('should read an empty event', () => {
      assert.deepStrictEqual(extractEvents(createSourceFile('event Paused: pass'), context), [
        { name: 'Paused', fields: [], diagnostics: [] },
      ])
    })

    it('should warn about unknown field types and reject unbalanced ones', () => {
      const [logged] = extractEvents(createSourceFile('event Logged:\n    data: bytes32\n'), context)
      assert.deepStrictEqual(
        logged.diagnostics.map((d) => [d.severity, d.subject]),
        [['warning', 'Logged.data']]
      )

      const [bad] = extractEvents(createSourceFile('event Bad:\n    who: indexed(address\n    ok: bool\n'), context)
      assert.deepStrictEqual(
        bad.fields.map((f) => f.name),
        ['ok']
      )
      assert.deepStrictEqual(bad.diagnostics, [
        {
          severity: 'error',
          code: 'malformed-type',
          subject: 'Bad.who',
          message: "Unbalanced brackets in type 'indexed(address'",
        },
      ])
    })
  })

  describe('Functions', () => {
    const token = [
      '@external',
      'def transfer(to: address, amount: uint256) -> bool:',
      '    """',
      '    Transfer tokens to a specified address.',
      '',
      '    Args:',
      '        to: The recipient address',
      '    """',
      '    return True',
      '',
    ].join('\n')

    it('should read parameters, return type and docstring', () => {
      const { external, internal } = extractFunctions(createSourceFile(token), context)

      assert.deepStrictEqual(internal, [])
      assert.deepStrictEqual(external, [
        {
          name: 'transfer',
          params: [
            { name: 'to', type: { kind: 'scalar', name: 'address' } },
            { name: 'amount', type: { kind: 'scalar', name: 'uint256' } },
          ],
          returnType: { kind: 'scalar', name: 'bool' },
          docstring: 'Transfer tokens to a specified address.\n\nArgs:\n    to: The recipient address',
          visibility: 'external',
          decorators: [],
          diagnostics: [],
        },
      ])
    })

    it('should partition by visibility and keep other decorators', () => {
      const source = createSourceFile(
        [
          '@internal',
          'def _helper(x: uint256) -> uint256:',
          '    return x',
          '',
          '@external',
          '@view',
          'def get() -> uint256:',
          '    return self._helper(1)',
          '',
          '@external',
          '@nonreentrant("lock")',
          'def set(value: uint256 = 0):',
          '    pass',
        ].join('\n')
      )
      const { external, internal } = extractFunctions(source, context)

      assert.deepStrictEqual(
        external.map((f) => f.name),
        ['get', 'set']
      )
      assert.deepStrictEqual(
        internal.map((f) => f.name),
        ['_helper']
      )
      assert.deepStrictEqual(external[0].decorators, ['view'])
      assert.deepStrictEqual(external[1].decorators, ['nonreentrant("lock")'])
      assert.deepStrictEqual(external[1].params, [
        { name: 'value', type: { kind: 'scalar', name: 'uint256' }, defaultValue: '0' },
      ])
      assert.strictEqual(external[1].returnType, null)
    })

    it('should read a multi-line signature with a tuple return type', () => {
      const source = createSourceFile(
        [
          '@external',
          'def swap(',
          '    amounts: DynArray[uint256, MAX_COINS],',
          '    min_out: uint256,',
          ') -> (uint256, bool):',
          '    return (0, True)',
        ].join('\n')
      )
      const [swap] = extractFunctions(source, context).external

      assert.deepStrictEqual(
        swap.params.map((p) => p.name),
        ['amounts', 'min_out']
      )
      assert.deepStrictEqual(swap.returnType, {
        kind: 'tuple',
        members: [
          { kind: 'scalar', name: 'uint256' },
          { kind: 'scalar', name: 'bool' },
        ],
      })
      assert.strictEqual(swap.docstring, null)
    })

    it('should read string defaults holding brackets and commas', () => {
      const source = createSourceFile(
        '@external\ndef f(s: String[4] = ")", sep: String[1] = ",", b: bool) -> uint256:  # note\n    return 0\n'
      )
      const [f] = extractFunctions(source, context).external

      assert.deepStrictEqual(f.params, [
        { name: 's', type: { kind: 'scalar', name: 'String[4]' }, defaultValue: '")"' },
        { name: 'sep', type: { kind: 'scalar', name: 'String[1]' }, defaultValue: '","' },
        { name: 'b', type: { kind: 'scalar', name: 'bool' } },
      ])
      assert.deepStrictEqual(f.returnType, { kind: 'scalar', name: 'uint256' })
      assert.deepStrictEqual(f.diagnostics, [])
    })

    it('should list a deploy constructor as external and keep its decorator', () => {
      const source = createSourceFile('@deploy\n@payable\ndef __init__(owner: address):\n    pass\n')
      const { external, internal } = extractFunctions(source, context)

      assert.deepStrictEqual(
        external.map((f) => [f.name, f.visibility, f.decorators]),
        [['__init__', 'external', ['deploy', 'payable']]]
      )
      assert.deepStrictEqual(internal, [])
    })

    it('should treat an undecorated module-level def as internal', () => {
      const source = createSourceFile('def _helper(x: uint256) -> uint256:\n    return x\n\n@view\ndef _peek() -> uint256:\n    return 1\n')
      const { external, internal } = extractFunctions(source, context)

      assert.deepStrictEqual(external, [])
      assert.deepStrictEqual(
        internal.map((f) => [f.name, f.visibility, f.decorators]),
        [
          ['_helper', 'internal', []],
          ['_peek', 'internal', ['view']],
        ]
      )
    })

    it('should skip undecorated interface members', () => {
      const source = createSourceFile(
        'interface IERC20:\n    def balanceOf(owner: address) -> uint256: view\n\n@external\ndef foo():\n    pass\n'
      )
      const { external, internal } = extractFunctions(source, context)

      assert.deepStrictEqual(
        external.map((f) => f.name),
        ['foo']
      )
      assert.deepStrictEqual(internal, [])
    })

    it('should drop a malformed parameter and keep its siblings', () => {
      const [g] = extractFunctions(createSourceFile('@external\ndef g(a: uint8], b: bool) -> bool:\n    pass\n'), context)
        .external

      assert.deepStrictEqual(g.params, [{ name: 'b', type: { kind: 'scalar', name: 'bool' } }])
      assert.deepStrictEqual(g.diagnostics, [
        { severity: 'error', code: 'malformed-type', subject: 'g.a', message: "Unbalanced brackets in type 'uint8]'" },
      ])
      assert.deepStrictEqual(g.returnType, { kind: 'scalar', name: 'bool' })
    })

    it('should report a malformed return type', () => {
      const [h] = extractFunctions(createSourceFile('@internal\ndef h() -> DynArray[uint8]:\n    pass\n'), context)
        .internal

      assert.strictEqual(h.returnType, null)
      assert.deepStrictEqual(h.diagnostics, [
        {
          severity: 'error',
          code: 'malformed-type',
          subject: 'h.return',
          message: "Expected DynArray[type, bound] but found 'DynArray[uint8]'",
        },
      ])
    })
  })

  describe('Variables', () => {
    it('should classify public and private state', () => {
      const source = createSourceFile('\n    owner: public(address)\n    balance: uint256\n    ')
      assert.deepStrictEqual(extractVariables(source, context), [
        { name: 'owner', type: { kind: 'scalar', name: 'address' }, visibility: 'public', diagnostics: [] },
        { name: 'balance', type: { kind: 'scalar', name: 'uint256' }, visibility: 'private', diagnostics: [] },
      ])
    })

    it('should ignore struct fields, constants, module statements and locals', () => {
      const source = createSourceFile(
        [
          '# pragma version 0.3.10',
          'implements: ERC20',
          '',
          'struct Point:',
          '    x: int128',
          '    y: int128',
          '',
          'MAX: constant(uint256) = 10',
          'CAP: public(constant(uint256)) = 20',
          'owner: public(address)',
          'points: HashMap[address, Point]',
          '',
          '@external',
          'def set(p: int128):',
          '    local: int128 = p',
          '    self.owner = msg.sender',
        ].join('\n')
      )
      const variables = extractVariables(source, context)

      assert.deepStrictEqual(
        variables.map((v) => [v.name, v.type.name, v.visibility]),
        [
          ['owner', 'address', 'public'],
          ['points', 'HashMap[address, Point]', 'private'],
        ]
      )
      assert.strictEqual(variables[1].diagnostics[0].code, 'non-conforming-type')
    })

    it('should strip an initial value from the type', () => {
      const [counter] = extractVariables(createSourceFile('counter: uint256 = 0\n'), context)
      assert.deepStrictEqual(counter.type, { kind: 'scalar', name: 'uint256' })
    })

    it('should report a local after a blank line inside a function body as contract state', () => {
      const source = createSourceFile(
        ['@external', 'def f():', '    a: uint256 = 1', '', '    leaked: uint256 = 2'].join('\n')
      )

      assert.deepStrictEqual(extractVariables(source, context), [
        { name: 'leaked', type: { kind: 'scalar', name: 'uint256' }, visibility: 'private', diagnostics: [] },
      ])
    })
  })
})
