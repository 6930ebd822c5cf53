// Architectural integer register file: 32 signed 32-bit registers with x0
// hardwired to zero. Two read ports and one write port; the pipeline applies
// the write at the writeback edge.

export class RegisterFile {
  static readonly REGISTER_COUNT = 32;

  private readonly registers: Int32Array;

  constructor() {
    this.registers = new Int32Array(RegisterFile.REGISTER_COUNT);
  }

  reset(): void {
    this.registers.fill(0);
  }

  read(index: number): number {
    this.validateRegisterIndex(index);
    return this.registers[index];
  }

  write(index: number, value: number): void {
    this.validateRegisterIndex(index);
    if (index === 0) return; // x0 is immutable
    this.registers[index] = value | 0;
  }

  snapshot(): number[] {
    return Array.from(this.registers);
  }

  private validateRegisterIndex(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= RegisterFile.REGISTER_COUNT) {
      throw new RangeError(`Register index out of bounds: ${index}`);
    }
  }
}
