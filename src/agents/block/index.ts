import { Destination } from '../../types/chat.types';
import { SpecialistAgent } from '../baseAgent';

export class BlockAgent extends SpecialistAgent {
  private readonly refusal: string;

  constructor(refusal: string) {
    super('block', Destination.BLOCK);
    this.refusal = refusal;
  }

  protected async execute(): Promise<string> {
    return this.refusal;
  }
}
