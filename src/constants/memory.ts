export const MEMORY_SIZE = 1 << 16;

/** Default load address for user programs */
export const PC_START = 0x3000;

/** Memory Mapped Registers */
export enum MemoryMappedRegister {
  MR_KBSR = 0xfe00 /* keyboard status */,
  MR_KBDR = 0xfe02 /* keyboard data */,
}

/** Bit 15 of the keyboard status register: a key is waiting in KBDR */
export const KEY_READY = 1 << 15;
