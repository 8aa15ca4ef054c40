export const P_CARRY       = 0x01;
export const P_ZERO        = 0x02;
export const P_IRQ_DISABLE = 0x04;
export const P_DECIMAL     = 0x08;
export const P_BREAK       = 0x10;
export const P_UNUSED      = 0x20;
export const P_OVERFLOW    = 0x40;
export const P_NEGATIVE    = 0x80;

export const DEFAULT_SP: number = 0xfd;

export const MEMORY_SIZE: number = 0x10000;

export const DEFAULT_START_ADDRESS: number  = 0x0000;
export const DEFAULT_END_ADDRESS: number    = MEMORY_SIZE - 1;

export const OPCODE_BRK: number = 0x00;

// tslint:disable:object-literal-sort-keys
export const ADDRESS = {
    ZERO_PAGE: 0x0000,
    STACK: 0x0100,
    RAM: 0x0200,
    PROGRAM: 0x8000,
    NMI: 0xfffa,
    RST: 0xfffc,
    IRQ: 0xfffe
};

export const DEFAULT_PROGRAM_ORIGIN: number = ADDRESS.PROGRAM;
