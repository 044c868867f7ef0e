import { GoogleGenAI } from "@google/genai";
import type { DetectionResult, EncodedImage } from "../types";
import { buildBriefAssessmentPrompt } from "../lib/prompts";
import type { ImageClassifier } from "./detectionService";

export const getAiClient = (apiKey: string) => {
    if (!apiKey) {
        throw new Error("API Key not found in environment variables.");
    }
    return new GoogleGenAI({ apiKey });
};

/** A stateful chat: every send sees the turns before it. */
export interface ConversationChannel {
    send(message: string): Promise<string>;
}

export const createGeminiClassifier = (ai: GoogleGenAI, model: string): ImageClassifier => ({
    name: "gemini",
    classify: async (image: EncodedImage, prompt: string) => {
        const response = await ai.models.generateContent({
            model,
            contents: { parts: [{ text: prompt }, { inlineData: { mimeType: image.mimeType, data: image.base64 } }] },
        });
        if (response.text) return response.text;
        throw new Error("Empty response");
    },
});

export const generateBriefAssessment = async (
    ai: GoogleGenAI,
    model: string,
    detection: DetectionResult
): Promise<string> => {
    try {
        const response = await ai.models.generateContent({
            model,
            contents: buildBriefAssessmentPrompt(detection),
        });
        if (response.text) return response.text.trim();
        throw new Error("Empty assessment response");
    } catch (error) {
        console.error("Brief Assessment Error:", error);
        return `${detection.issue} can cause significant damage to ${detection.plantType}. Treatment recommended.`;
    }
};

export const openConversationChannel = (
    ai: GoogleGenAI,
    model: string,
    systemInstruction: string
): ConversationChannel => {
    const chat = ai.chats.create({ model, config: { systemInstruction } });
    return {
        send: async (message: string) => {
            const response = await chat.sendMessage({ message });
            if (response.text) return response.text.trim();
            throw new Error("Empty response from model");
        },
    };
};
