import mongoose, { Schema, type Types } from "mongoose";

export interface INote {
  title: string;
  body: string;
  user: Types.ObjectId;
  createdAt: Date;
  updatedAt: Date;
}

const NoteSchema = new Schema<INote>(
  {
    title: {
      type: String,
      required: [true, "Title is required"],
      trim: true,
    },
    body: {
      type: String,
      default: "",
    },
    user: {
      type: Schema.Types.ObjectId,
      ref: "User",
      required: true,
    },
  },
  { timestamps: true } // Adds createdAt and updatedAt automatically
);

// Listing is always "this owner's notes, newest first"
NoteSchema.index({ user: 1, createdAt: -1 });

const Note = mongoose.model<INote>("Note", NoteSchema);

export default Note;
