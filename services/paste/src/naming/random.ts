const NAME_CHARS = 'abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';

export type RandomSource = () => number;

export function randomName(length: number, random: RandomSource = Math.random): string {
  let result = '';
  for (let i = 0; i < length; i += 1) {
    result += NAME_CHARS.charAt(Math.floor(random() * NAME_CHARS.length));
  }
  return result;
}
