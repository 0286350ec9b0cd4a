/** First `max` code points of `text`, with `...` appended when anything was cut. */
export const preview = (text: string, max: number): string => {
  const chars = Array.from(text);
  return chars.length > max ? `${chars.slice(0, max).join('')}...` : text;
};
