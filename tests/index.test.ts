import { describe, it, expect } from 'vitest';
import { INSTRUCTION_CATALOG, decodeStream, renderProgram, resolveConfig } from '../src';

describe('Public API', () => {
    it('should decode and render through the package entry', () => {
        const config = resolveConfig({ listing: false });
        const result = decodeStream(new Uint8Array([0x8B, 0xC3, 0xB0, 0x05]), { startOffset: config.startOffset });

        expect(INSTRUCTION_CATALOG).toHaveLength(10);
        expect(renderProgram(result.instructions, config)).toEqual(['bits 16', 'mov ax, bx', 'mov al, 5']);
    });
});
