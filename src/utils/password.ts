import bcrypt from "bcrypt";

export const hashPassword = async (
  password: string,
  rounds: number
): Promise<string> => {
  const salt = await bcrypt.genSalt(rounds);
  return bcrypt.hash(password, salt);
};

export const verifyPassword = (
  candidate: string,
  passwordHash: string
): Promise<boolean> => bcrypt.compare(candidate, passwordHash);
