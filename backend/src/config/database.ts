import mongoose from 'mongoose';

export const connectDatabase = async (): Promise<void> => {
  try {
    const mongoUri = process.env.MONGODB_URI || 'mongodb://localhost:27017/interview-coach';

    console.log(`\n${'='.repeat(60)}`);
    console.log(`🔧 MONGODB CONNECTION (interview logs)`);
    console.log(`${'='.repeat(60)}`);
    console.log(`MongoDB URI: ${mongoUri.substring(0, 30)}...${mongoUri.slice(-20)}`);
    console.log(`${'='.repeat(60)}\n`);

    mongoose.connection.on('connected', () => {
      console.log('✓ MongoDB connected');
    });

    mongoose.connection.on('error', (error) => {
      console.error('❌ MongoDB connection error:', error);
    });

    mongoose.connection.on('disconnected', () => {
      console.warn('⚠️ MongoDB disconnected');
    });

    await mongoose.connect(mongoUri, {
      serverSelectionTimeoutMS: 5000,
      socketTimeoutMS: 45000,
      family: 4,
      maxPoolSize: 10,
    });
  } catch (error) {
    console.error('❌ Failed to connect to MongoDB:', error);
    throw error;
  }
};

export const disconnectDatabase = async (): Promise<void> => {
  await mongoose.connection.close();
};
