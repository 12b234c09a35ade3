import mongoose from "mongoose";

let isConnecting = false;

export async function connectToDatabase(uri: string): Promise<void> {
  if (mongoose.connection.readyState === 1 || isConnecting) return;
  isConnecting = true;

  try {
    // Indexes are owned by the migrations, not created on model compile
    await mongoose.connect(uri, { autoIndex: false });
  } finally {
    isConnecting = false;
  }
  console.log("[db] connected");

  mongoose.connection.on("error", (err) => {
    console.error("[db] error:", err);
  });
  mongoose.connection.on("disconnected", () => {
    console.log("[db] disconnected");
  });
}

export async function disconnectFromDatabase(): Promise<void> {
  if (mongoose.connection.readyState !== 0) {
    await mongoose.disconnect();
  }
}
