import { describe, expect, it } from 'vitest'
import { classify, literalText, toLiteral } from '../src/classifier.js'
import { MalformedVersionLiteralError } from '../src/errors.js'
import { parse } from '../src/version.js'

const text = (value: string) => ({ kind: 'text' as const, value })

describe('Literal Classifier', () => {
  describe('toLiteral', () => {
    it('should tag strings as text and numbers as numeric', () => {
      expect(toLiteral('1.2')).toEqual({ kind: 'text', value: '1.2' })
      expect(toLiteral(1.2)).toEqual({ kind: 'numeric', value: 1.2 })
      expect(toLiteral(7n)).toEqual({ kind: 'numeric', value: 7n })
    })

    it('should pass tagged literals through', () => {
      const literal = text('v1.2.3')
      expect(toLiteral(literal)).toBe(literal)
    })
  })

  describe('literalText', () => {
    it('should use the shortest decimal text of a number', () => {
      expect(literalText({ kind: 'numeric', value: 0.96 })).toBe('0.96')
      expect(literalText({ kind: 'numeric', value: 3 })).toBe('3')
      expect(literalText({ kind: 'numeric', value: 10n })).toBe('10')
    })

    it('should expand exponent notation to fixed point', () => {
      expect(literalText({ kind: 'numeric', value: 1e-7 })).toBe('0.0000001')
    })

    it('should keep every digit of a small number', () => {
      expect(literalText({ kind: 'numeric', value: 1.23456789e-7 })).toBe('0.000000123456789')
      expect(literalText({ kind: 'numeric', value: 1e-10 })).toBe('0.0000000001')
      expect(literalText({ kind: 'numeric', value: 2.5e-12 })).toBe('0.0000000000025')
    })

    it('should expand large numbers to plain integers', () => {
      expect(literalText({ kind: 'numeric', value: 1e21 })).toBe('1000000000000000000000')
      expect(literalText({ kind: 'numeric', value: 1.5e21 })).toBe('1500000000000000000000')
    })

    it('should round-trip long fractions through numify', () => {
      const version = parse(1.23456789e-7)
      expect(version.components).toEqual([0n, 0n, 0n, 123n, 456n, 789n])
      expect(version.numify()).toBe('0.000000123456789')
      expect(version.stringify()).toBe('0.000000123456789')
      expect(parse(1e-10).numify()).toBe('0.0000000001')
    })
  })

  describe('grammar selection', () => {
    it('should classify a leading v as DirectDotted', () => {
      expect(classify(text('v1.2.3'))).toEqual({
        grammar: 'DirectDotted',
        leadingV: true,
        alphaIndex: null,
        residual: '1.2.3',
        text: 'v1.2.3',
      })
    })

    it('should accept an uppercase V', () => {
      const result = classify(text('V1.2'))
      expect(result.grammar).toBe('DirectDotted')
      expect(result.leadingV).toBe(true)
      expect(result.residual).toBe('1.2')
    })

    it('should classify two or more dots as DirectDotted', () => {
      expect(classify(text('1.2.3')).grammar).toBe('DirectDotted')
      expect(classify(text('1.2.3')).leadingV).toBe(false)
    })

    it('should classify one-dot and integer literals as DecimalGrouped', () => {
      expect(classify(text('1.23')).grammar).toBe('DecimalGrouped')
      expect(classify(text('42')).grammar).toBe('DecimalGrouped')
      expect(classify({ kind: 'numeric', value: 0.96 }).grammar).toBe('DecimalGrouped')
    })
  })

  describe('alpha marker', () => {
    it('should locate the marker in the fractional run of a decimal', () => {
      expect(classify(text('1.002_03')).alphaIndex).toBe(5)
    })

    it('should locate the marker in the final dotted segment', () => {
      expect(classify(text('v1.2.3_4')).alphaIndex).toBe(5)
    })

    it('should accept the marker in a dotted literal without dots', () => {
      expect(classify(text('v1_2')).alphaIndex).toBe(1)
    })

    it('should reject a marker outside the final segment', () => {
      expect(() => classify(text('1_2.3'))).toThrow('the alpha marker "_" is only allowed in the final segment')
    })

    it('should reject a marker in a decimal without a fractional part', () => {
      expect(() => classify(text('1_2'))).toThrow('the alpha marker "_" is only allowed in the fractional part')
    })

    it('should reject more than one marker', () => {
      expect(() => classify(text('1.2_3_4'))).toThrow('more than one alpha marker "_"')
    })

    it('should reject a marker without digits on both sides', () => {
      expect(() => classify(text('1.2_'))).toThrow('the alpha marker "_" must have digits on both sides')
      expect(() => classify(text('1._2'))).toThrow('the alpha marker "_" must have digits on both sides')
    })
  })

  describe('malformed literals', () => {
    it('should reject literals without digits', () => {
      expect(() => classify(text(''))).toThrow('Invalid version literal "": no digits')
      expect(() => classify(text('v'))).toThrow('Invalid version literal "v": no digits')
    })

    it('should reject a dot without digits on one side', () => {
      expect(() => classify(text('1..2'))).toThrow('"." must have digits on both sides')
      expect(() => classify(text('.5'))).toThrow('"." must have digits on both sides')
      expect(() => classify(text('5.'))).toThrow('"." must have digits on both sides')
      expect(() => classify(text('v.1.2'))).toThrow('"." must have digits on both sides')
    })

    it('should reject a v anywhere but the start', () => {
      expect(() => classify(text('vv1.2'))).toThrow('"v" is only allowed at the start')
      expect(() => classify(text('1.2v'))).toThrow('"v" is only allowed at the start')
    })

    it('should reject foreign characters', () => {
      expect(() => classify(text('1.2.3-beta'))).toThrow('unexpected character "-"')
      expect(() => classify(text(' 1.2'))).toThrow('unexpected character " "')
      expect(() => classify(text('1.2+build'))).toThrow('unexpected character "+"')
    })

    it('should reject negative and non-finite numbers', () => {
      expect(() => classify({ kind: 'numeric', value: -1 })).toThrow(MalformedVersionLiteralError)
      expect(() => classify({ kind: 'numeric', value: Number.NaN })).toThrow(MalformedVersionLiteralError)
      expect(() => classify({ kind: 'numeric', value: Number.POSITIVE_INFINITY })).toThrow(MalformedVersionLiteralError)
      expect(() => classify({ kind: 'numeric', value: -1e-7 })).toThrow(MalformedVersionLiteralError)
    })

    it('should carry the literal and reason on the error', () => {
      try {
        classify(text('1..2'))
        expect.unreachable()
      }
      catch (error) {
        expect(error).toBeInstanceOf(MalformedVersionLiteralError)
        if (error instanceof MalformedVersionLiteralError) {
          expect(error.code).toBe('MALFORMED_VERSION_LITERAL')
          expect(error.literal).toBe('1..2')
          expect(error.reason).toBe('"." must have digits on both sides')
          expect(error.name).toBe('MalformedVersionLiteralError')
        }
      }
    })
  })
})
