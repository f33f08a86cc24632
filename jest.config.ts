module.exports = {
    "preset": "ts-jest",
    "testEnvironment": "node",
    "roots": [
        "<rootDir>/packages/core/test",
        "<rootDir>/packages/cli/test"
    ],
    "moduleNameMapper": {
        '^iterbar$': '<rootDir>/packages/core/src'
    }
}
