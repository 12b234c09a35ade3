import Joi from "joi";

export interface SignUpInput {
  username: string;
  password: string;
}

export interface LogInInput {
  username: string;
  password: string;
}

export interface NoteInput {
  title: string;
  body: string;
}

const requiredString = (message: string) =>
  Joi.string().required().messages({
    "any.required": message,
    "string.empty": message,
    "string.base": message,
  });

// Keys are checked in declaration order and the first failure wins
export const signUpSchema = Joi.object<SignUpInput>({
  username: requiredString("Username is required").trim(),
  password: requiredString("Password is required"),
});

export const logInSchema = Joi.object<LogInInput>({
  username: Joi.string().trim().required(),
  password: Joi.string().required(),
});

export const createNoteSchema = Joi.object<NoteInput>({
  title: requiredString("Title is required").trim(),
  body: Joi.string().allow("").default(""), // Allow empty body
});

export const validationOptions: Joi.ValidationOptions = {
  abortEarly: true,
  stripUnknown: true,
};
