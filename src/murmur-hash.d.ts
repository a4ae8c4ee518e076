declare module 'murmur-hash' {
  const murmur: {
    v3: {
      x86: {
        hash32(key: string, seed?: number): number;
      };
    };
  };
  export = murmur;
}
