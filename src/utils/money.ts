export const roundMoney = (amount: number): number => Math.round((amount + Number.EPSILON) * 100) / 100;

export const percentOf = (amount: number, percent: number): number => roundMoney((amount * percent) / 100);

export const sumMoney = (amounts: number[]): number => roundMoney(amounts.reduce((acc, n) => acc + n, 0));
